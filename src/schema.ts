import { z } from "zod";
import type { FeastDocument, FeastRecord } from "./types.js";

export const FeastRecordSchema = z.object({
  date: z.string(),
  title: z.string().min(1, { error: "Feast title must not be empty" }),
  description: z.string(),
  color: z.string(),
  type: z.string(),
  classification: z.string(),
  tags: z.array(z.string()),
}) satisfies z.ZodType<FeastRecord>;

export const FeastDocumentSchema = z.union([
  z.array(FeastRecordSchema),
  z.record(z.string(), z.array(FeastRecordSchema)),
]) satisfies z.ZodType<FeastDocument>;

/**
 * Validate a decoded JSON value against the dataset schema.
 * Returns the document, or a readable list of issues.
 */
export function validateDocument(
  value: unknown
): { success: true; data: FeastDocument } | { success: false; message: string } {
  const result = FeastDocumentSchema.safeParse(value);
  if (result.success) return { success: true, data: result.data };
  return { success: false, message: z.prettifyError(result.error) };
}
