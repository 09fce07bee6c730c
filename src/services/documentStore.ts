import { mkdir, readFile, readdir, unlink, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { formatIssues } from "../modules/application.schema";

export const ALL_STATES = "ALL";
export const GUIDELINE_TYPE = "guideline";

export const DocumentSchema = z.object({
  docId: z
    .string()
    .trim()
    .min(1, "Document ID cannot be empty")
    .regex(/^[A-Za-z0-9_-]+$/, "Document ID may only contain letters, digits, - and _"),
  title: z.string().trim().min(1, "Document title cannot be empty"),
  content: z.string().trim().min(1, "Document content cannot be empty"),
  docType: z.string().trim().min(1).default(GUIDELINE_TYPE),
  metadata: z.record(z.unknown()).default({}),
  applicableStates: z.array(z.string().trim().toUpperCase()).min(1).default([ALL_STATES])
});

const StoredDocumentSchema = DocumentSchema.extend({
  lastUpdated: z.string().datetime()
});

export type DocumentInput = z.input<typeof DocumentSchema>;
export type DocumentUpdate = Partial<Omit<DocumentInput, "docId">>;
export type StoredDocument = z.infer<typeof StoredDocumentSchema>;

export class DocumentNotFoundError extends Error {
  constructor(docId: string) {
    super(`Document ${docId} not found`);
    this.name = "DocumentNotFoundError";
  }
}

export interface DocumentStore {
  readonly docsDir: string;
  /** Adds a document, replacing any stored under the same id. */
  add(input: DocumentInput): Promise<StoredDocument>;
  get(docId: string): StoredDocument;
  list(): StoredDocument[];
  /** Case-insensitive substring match on title and content, optionally metadata. */
  search(query: string, options?: { metadata?: boolean }): StoredDocument[];
  update(docId: string, changes: DocumentUpdate): Promise<StoredDocument>;
  delete(docId: string): Promise<void>;
  byType(docType: string): StoredDocument[];
  byState(state: string): StoredDocument[];
  guidelinesFor(businessType: string): StoredDocument[];
}

export interface DocumentStoreOptions {
  now?: () => Date;
}

function documentPath(docsDir: string, docId: string) {
  return path.join(docsDir, `${docId}.json`);
}

function parseDocument(input: unknown) {
  const parsed = DocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(formatIssues(parsed.error));
  }
  return parsed.data;
}

async function loadDocuments(docsDir: string) {
  const documents = new Map<string, StoredDocument>();
  const files = (await readdir(docsDir)).filter((file) => file.endsWith(".json")).sort();

  for (const file of files) {
    const filePath = path.join(docsDir, file);
    let data: unknown;
    try {
      data = JSON.parse(await readFile(filePath, "utf8"));
    } catch (err) {
      console.error(`Skipping document ${filePath}:`, err instanceof Error ? err.message : err);
      continue;
    }

    const parsed = StoredDocumentSchema.safeParse(data);
    if (!parsed.success) {
      console.error(`Skipping document ${filePath}: ${formatIssues(parsed.error)}`);
      continue;
    }
    documents.set(parsed.data.docId, parsed.data);
  }

  return documents;
}

/**
 * JSON-file store of underwriting documents, one `<docId>.json` per document.
 * The directory is created if missing and read once when the store opens.
 */
export async function openDocumentStore(
  docsDir: string,
  options: DocumentStoreOptions = {}
): Promise<DocumentStore> {
  const now = options.now ?? (() => new Date());

  await mkdir(docsDir, { recursive: true });
  const documents = await loadDocuments(docsDir);

  async function save(document: Omit<StoredDocument, "lastUpdated">) {
    const stored: StoredDocument = { ...document, lastUpdated: now().toISOString() };
    await writeFile(documentPath(docsDir, stored.docId), `${JSON.stringify(stored, null, 2)}\n`);
    documents.set(stored.docId, stored);
    return stored;
  }

  function get(docId: string) {
    const document = documents.get(docId);
    if (!document) {
      throw new DocumentNotFoundError(docId);
    }
    return document;
  }

  function list() {
    return [...documents.values()].sort((a, b) => a.docId.localeCompare(b.docId));
  }

  return {
    docsDir,

    async add(input) {
      return save(parseDocument(input));
    },

    get,

    list,

    search(query, { metadata = false } = {}) {
      const needle = query.trim().toLowerCase();
      if (!needle) return [];

      return list().filter(
        (document) =>
          document.title.toLowerCase().includes(needle) ||
          document.content.toLowerCase().includes(needle) ||
          (metadata && JSON.stringify(document.metadata).toLowerCase().includes(needle))
      );
    },

    async update(docId, changes) {
      return save(parseDocument({ ...get(docId), ...changes, docId }));
    },

    async delete(docId) {
      get(docId);
      await unlink(documentPath(docsDir, docId));
      documents.delete(docId);
    },

    byType(docType) {
      return list().filter((document) => document.docType === docType);
    },

    byState(state) {
      const code = state.trim().toUpperCase();
      return list().filter(
        (document) =>
          document.applicableStates.includes(code) || document.applicableStates.includes(ALL_STATES)
      );
    },

    guidelinesFor(businessType) {
      const wanted = businessType.trim().toLowerCase();
      return list().filter((document) => {
        const type = document.metadata.businessType;
        return (
          document.docType === GUIDELINE_TYPE &&
          typeof type === "string" &&
          type.trim().toLowerCase() === wanted
        );
      });
    }
  };
}
