import type { Translator } from "../interfaces";
import type { PrepareResult, TranslationContext } from "../types";
import { PREPARE_READY } from "../types";

export class StubTranslator implements Translator {
  async translate(
    text: string,
    _sourceLang: string,
    targetLang: string,
    _context: TranslationContext
  ): Promise<string> {
    // Stub: returns a deterministic "translated" string
    return `[${targetLang}] ${text}`;
  }

  async isReady(): Promise<boolean> {
    return true;
  }

  async prepare(): Promise<PrepareResult> {
    return PREPARE_READY;
  }

  async close(): Promise<void> {}
}
