/** Byte-oriented key/value storage backing the snapshot store. */
export interface StoragePort {
  write(key: string, value: Buffer | string): Promise<void>;
  /** Resolves to null when nothing is stored under `key`. */
  read(key: string): Promise<Buffer | null>;
  /** Deleting an absent key is not an error. */
  remove(key: string): Promise<void>;
}
