import fs from "node:fs";

import type { Logger } from "@harvest-hub/core";

import { countBy } from "../repository/aggregates";
import {
  documentEntity,
  type DocumentCreate,
  type DocumentRecord,
  type DocumentUpdate
} from "../repository/shared-entities";
import type { SharedRepository } from "../repository/shared-repository";
import { resolveSharedDependencies, type SharedServiceDependencies } from "./context";

export type DocumentStatistics = {
  totalDocuments: number;
  documentsByType: Record<string, number>;
  totalStorageBytes: number;
  totalStorageMb: number;
};

export type DeleteDocumentOptions = {
  /** Also remove the file at the record's path when it exists. */
  deleteFile?: boolean;
};

function fileSize(filePath: string): number {
  return fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
}

/** Records of files kept beside the store; rendering the files themselves happens elsewhere. */
export class DocumentService {
  private readonly shared: SharedRepository;
  private readonly log: Logger;

  constructor(deps: SharedServiceDependencies) {
    const resolved = resolveSharedDependencies(deps);
    this.shared = resolved.shared;
    this.log = resolved.logger;
  }

  createDocumentRecord(input: DocumentCreate): DocumentRecord {
    return this.shared.create(documentEntity, input);
  }

  getDocument(id: number): DocumentRecord | null {
    return this.shared.getById(documentEntity, id);
  }

  getDocumentByPath(filePath: string): DocumentRecord | null {
    return this.shared.findOne(documentEntity, { where: { filePath: filePath.trim() } });
  }

  /** Newest first. */
  listDocuments(type?: string): DocumentRecord[] {
    return this.shared.list(documentEntity, { where: type === undefined ? {} : { type } });
  }

  updateDocument(id: number, patch: DocumentUpdate): DocumentRecord | null {
    return this.shared.update(documentEntity, id, patch);
  }

  deleteDocument(id: number, options: DeleteDocumentOptions = {}): boolean {
    const document = this.getDocument(id);
    if (!document) {
      return false;
    }
    if (options.deleteFile && fs.existsSync(document.filePath)) {
      fs.rmSync(document.filePath);
      this.log.info("Document file removed", { documentId: id, path: document.filePath });
    }
    return this.shared.delete(documentEntity, id);
  }

  /** Counts by type (untyped records under "Unknown") and the size of the files that still exist. */
  getDocumentStatistics(): DocumentStatistics {
    const documents = this.listDocuments();
    const totalStorageBytes = documents.reduce((total, document) => total + fileSize(document.filePath), 0);

    return {
      totalDocuments: documents.length,
      documentsByType: Object.fromEntries(countBy(documents, (document) => document.type ?? "Unknown")),
      totalStorageBytes,
      totalStorageMb: totalStorageBytes / (1024 * 1024)
    };
  }
}
