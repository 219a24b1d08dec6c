import { pgTable, text, boolean } from "drizzle-orm/pg-core";
import { z } from "zod";

// ============ CATALOGUE TABLES (read-only for this service) ============

export const brands = pgTable("Brand", {
  id: text("id"),
  name: text("name").notNull(),
});

export const products = pgTable("Product", {
  id: text("id"),
  name: text("name").notNull(),
  isPublished: boolean("isPublished").notNull().default(false),
});

export type CatalogueTable = "Brand" | "Product";

export interface NamedRecord {
  id: string;
  name: string;
}

// ============ API SCHEMAS ============

export const queryRequestSchema = z.object({
  query: z.string().refine((value) => value.trim().length > 0, "Query is required"),
});

export interface SuggestionResult {
  productName: NamedRecord[];
  brandName: NamedRecord[];
  styles: string[];
}

export interface SuggestionPayload {
  product_name: NamedRecord[];
  brand_name: NamedRecord[];
  styles: string[];
}
