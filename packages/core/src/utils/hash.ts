/**
 * djb2 over UTF-16 code units, rendered as exactly 8 hex digits.
 * Not cryptographic: collisions are possible and tolerated.
 */
export function simpleHash(str: string): string {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) | 0; // keep 32 bits
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}
