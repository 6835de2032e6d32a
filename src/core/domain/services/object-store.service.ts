export interface StoredObject {
  key: string;
  lastModified: number;
}

/** The subset of an object store the S3 archive source needs. */
export interface IObjectStoreClient {
  /** Objects directly below `prefix`, in the order the store returns them. */
  listObjects(bucket: string, prefix: string): Promise<StoredObject[]>;
  getObjectText(bucket: string, key: string): Promise<string>;
  deleteObject(bucket: string, key: string): Promise<void>;
}
