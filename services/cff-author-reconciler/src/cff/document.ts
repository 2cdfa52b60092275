import { readFile } from "node:fs/promises";
import { isMap, isSeq, parseDocument } from "yaml";
import { CffDocumentError } from "../errors";
import { cffRootSchema, type AuthorRecord, type CffDocument } from "./types";

/**
 * Parse a citation file. Any YAML error or schema violation is fatal;
 * there is no partial-document mode.
 */
export function loadCff(text: string): CffDocument {
  const tree = parseDocument(text);

  if (tree.errors.length > 0) {
    throw new CffDocumentError(`Malformed citation file: ${tree.errors[0].message}`);
  }
  if (!isMap(tree.contents)) {
    throw new CffDocumentError("Citation file must be a YAML mapping");
  }

  const authorsNode: unknown = tree.get("authors", true);
  if (authorsNode !== undefined && !isSeq(authorsNode)) {
    throw new CffDocumentError("`authors` must be a list");
  }

  const data: unknown = tree.toJS();
  const parsed = cffRootSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "document";
    throw new CffDocumentError(`Invalid citation file at ${where}: ${issue.message}`);
  }

  return { authors: parsed.data.authors ?? [], tree };
}

/**
 * Read a citation file from disk. An unreadable file is as fatal as a
 * malformed one.
 */
export async function readCffText(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    throw new CffDocumentError(`${path} could not be read: ${(err as Error).message}`);
  }
}

/**
 * Returns a new document with `records` appended to `authors`. Existing
 * entries, their order and every other key are left as they were.
 */
export function appendAuthors(
  doc: CffDocument,
  records: readonly AuthorRecord[],
): CffDocument {
  if (records.length === 0) {
    return doc;
  }

  const tree = doc.tree.clone();
  let authorsNode: unknown = tree.get("authors", true);
  if (!isSeq(authorsNode)) {
    authorsNode = tree.createNode([]);
    tree.set("authors", authorsNode);
  }
  if (!isSeq(authorsNode)) {
    throw new CffDocumentError("`authors` could not be created");
  }

  authorsNode.flow = false;
  for (const record of records) {
    authorsNode.items.push(tree.createNode(record));
  }

  return { authors: [...doc.authors, ...records], tree };
}

export function serializeCff(doc: CffDocument): string {
  return doc.tree.toString({ lineWidth: 0 });
}
