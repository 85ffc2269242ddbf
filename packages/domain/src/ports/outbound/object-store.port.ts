export interface StoredObjectMetadata {
  readonly contentType: string;
  readonly size: number;
  readonly updatedAt: Date;
}

export interface ObjectStorePort {
  getObject(bucket: string, key: string): Promise<Buffer>;
  /** Writes the object, replacing whatever is stored under the key. */
  putObject(bucket: string, key: string, body: Buffer | string, contentType: string): Promise<void>;
  headObject(bucket: string, key: string): Promise<StoredObjectMetadata | null>;
}
