/**
 * Object-storage capability the batch engine drives.
 * Implementations must be safe for concurrent calls.
 */
export interface StorageClient {
  createContainerIfNotExists(container: string): Promise<void>;
  putObject(container: string, objectName: string, localPath: string): Promise<void>;
  getObject(container: string, objectName: string, localPath: string): Promise<void>;
  listObjects(container: string, prefix?: string): Promise<string[]>;
}

export interface S3ServiceOptions {
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  maxAttempts?: number;
}
