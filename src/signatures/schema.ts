import { z } from "zod";
import { isHex } from "../util/hex.js";

export const signatureEntrySchema = z.object({
  extension: z.string().trim().min(1, "extension cannot be empty"),
  magic_bytes: z
    .string()
    .refine(isHex, { message: "magic_bytes must be an even-length hex string" }),
  offset: z.number().int().nonnegative().optional(),
  description: z.string().nullish(),
  mime_type: z.string().nullish(),
});

export const signatureFileSchema = z.object({
  version: z.string().optional(),
  description: z.string().optional(),
  signatures: z.array(signatureEntrySchema),
});

export type SignatureEntry = z.infer<typeof signatureEntrySchema>;
export type SignatureFile = z.infer<typeof signatureFileSchema>;
