import mongoose, { Schema, Document } from "mongoose";

export interface ITranslationCacheEntry extends Document {
  key: string;
  /** Serialized { value, createdAt } envelope */
  value: string;
  createdAt: Date;
  updatedAt: Date;
}

const TranslationCacheEntrySchema = new Schema<ITranslationCacheEntry>(
  {
    key: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    value: {
      type: String,
      required: true,
    },
  },
  {
    timestamps: true,
  }
);

export const TranslationCacheEntry = mongoose.model<ITranslationCacheEntry>(
  "TranslationCacheEntry",
  TranslationCacheEntrySchema
);
