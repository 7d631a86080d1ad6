import { createLogger } from "../utils/logger.js";

const logger = createLogger("storage:memory");

export type ContentHash = string;

/**
 * Content-addressed blob store. Identical bodies are stored once.
 */
export class MemoryStorage {
  private dataStore: Map<ContentHash, Buffer> = new Map();

  async store(hash: ContentHash, content: Buffer): Promise<void> {
    if (this.dataStore.has(hash)) return;
    this.dataStore.set(hash, Buffer.from(content));
    logger.debug({ hash, size: content.length }, "Content stored");
  }

  async retrieve(hash: ContentHash): Promise<Buffer | null> {
    const content = this.dataStore.get(hash);
    if (!content) {
      logger.warn({ hash }, "Content not found");
      return null;
    }
    return content;
  }

  async has(hash: ContentHash): Promise<boolean> {
    return this.dataStore.has(hash);
  }

  async size(): Promise<number> {
    return this.dataStore.size;
  }
}
