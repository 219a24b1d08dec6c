import { fileURLToPath } from 'url';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const dataDir = fileURLToPath(new URL('../data/', import.meta.url));

export const lexiconFileSchema = z.object({
  features: z.record(z.string().min(1), z.string()),
});

export const featurePatternFileSchema = z.object({
  direct: z.array(z.object({ pattern: z.string().min(1), feature: z.string().min(1) })),
  corrections: z.array(z.object({ pattern: z.string().min(1), correction: z.string() })),
});

export const productTypeFileSchema = z.object({
  productTypes: z.record(z.string().min(1), z.array(z.string().min(1))),
});

export const styleFileSchema = z.object({
  styles: z.array(z.string().min(1)),
  rooms: z.array(z.string().min(1)),
  colors: z.array(z.string().min(1)),
});

export type LexiconFile = z.infer<typeof lexiconFileSchema>;
export type FeaturePatternFile = z.infer<typeof featurePatternFileSchema>;
export type ProductTypeFile = z.infer<typeof productTypeFileSchema>;
export type StyleFile = z.infer<typeof styleFileSchema>;

function readDataFile<T>(fileName: string, schema: z.ZodType<T>): T {
  const filePath = path.join(dataDir, fileName);
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid data file ${fileName}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}

export function loadLexiconFile(): LexiconFile {
  return readDataFile('lexicon.json', lexiconFileSchema);
}

export function loadFeaturePatternFile(): FeaturePatternFile {
  return readDataFile('feature-patterns.json', featurePatternFileSchema);
}

export function loadProductTypeFile(): ProductTypeFile {
  return readDataFile('product-types.json', productTypeFileSchema);
}

export function loadStyleFile(): StyleFile {
  return readDataFile('styles.json', styleFileSchema);
}
