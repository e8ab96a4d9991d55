export type BlobStorage = {
  /** Write `data` under `bucket`/`key` and return a URI for the stored object. */
  put(bucket: string, key: string, data: Uint8Array, contentType: string): Promise<string>;
  get(bucket: string, key: string): Promise<Buffer | null>;
};
