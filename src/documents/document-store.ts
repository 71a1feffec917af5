import { Injectable } from '@nestjs/common';

export const DOCUMENT_STORE = Symbol('DOCUMENT_STORE');

export type StoredDocument = {
  bytes: Buffer;
  contentType: string;
};

/** Source of raw document bytes. */
export interface DocumentStore {
  fetch(documentId: string): Promise<StoredDocument | null>;
  put(documentId: string, doc: StoredDocument): Promise<void>;
  remove(documentId: string): Promise<void>;
}

@Injectable()
export class InMemoryDocumentStore implements DocumentStore {
  private readonly docs = new Map<string, StoredDocument>();

  async fetch(documentId: string) {
    return this.docs.get(documentId) ?? null;
  }

  async put(documentId: string, doc: StoredDocument) {
    this.docs.set(documentId, { bytes: Buffer.from(doc.bytes), contentType: doc.contentType });
  }

  async remove(documentId: string) {
    this.docs.delete(documentId);
  }
}
