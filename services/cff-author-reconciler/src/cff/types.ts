import { z } from "zod";
import type { Document } from "yaml";

export const authorRecordSchema = z
  .object({
    "given-names": z.string().optional(),
    "family-names": z.string().optional(),
    name: z.string().optional(),
    orcid: z.string().optional(),
    alias: z.string().optional(),
    email: z.string().optional(),
    affiliation: z.string().optional(),
  })
  .passthrough();

/**
 * One entry of the `authors` list. Fields the schema does not name are
 * carried through untouched.
 */
export type AuthorRecord = z.infer<typeof authorRecordSchema>;

export const cffRootSchema = z
  .object({
    "cff-version": z.string().min(1),
    authors: z.array(authorRecordSchema).optional(),
  })
  .passthrough();

export type AuthorKind = "person" | "entity" | "unknown";

/**
 * A loaded citation file: the typed author list plus the parsed YAML tree,
 * which keeps every other key, their order and comments.
 */
export interface CffDocument {
  readonly authors: readonly AuthorRecord[];
  readonly tree: Document;
}

export function authorKind(author: AuthorRecord): AuthorKind {
  if (author.name !== undefined) return "entity";
  if (author["given-names"] !== undefined || author["family-names"] !== undefined) {
    return "person";
  }
  return "unknown";
}

export function displayNameOf(author: AuthorRecord): string {
  if (author.name !== undefined) {
    return author.name;
  }
  return [author["given-names"], author["family-names"]]
    .filter((part): part is string => part !== undefined && part.trim() !== "")
    .join(" ");
}
