import fs from "node:fs/promises";
import path from "node:path";
import { StorageError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { BlobStorage } from "./types.js";

const log = createSubsystemLogger("storage:local");

/**
 * Blob sink on the local filesystem: `<baseDir>/<bucket>/<key>`. Content
 * types are not recorded; the key's extension carries that information.
 */
export class LocalBlobStorage implements BlobStorage {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  resolvePath(bucket: string, key: string): string {
    const bucketDir = path.join(this.baseDir, bucket);
    const dest = path.resolve(bucketDir, key);
    if (path.dirname(bucketDir) !== this.baseDir || !dest.startsWith(bucketDir + path.sep)) {
      throw new StorageError(`Key escapes bucket directory: ${bucket}/${key}`, { bucket, key });
    }
    return dest;
  }

  async put(bucket: string, key: string, data: Uint8Array, contentType: string): Promise<string> {
    const dest = this.resolvePath(bucket, key);
    try {
      await fs.mkdir(path.dirname(dest), { recursive: true });
      await fs.writeFile(dest, data);
    } catch (err) {
      throw new StorageError(`Failed to write ${bucket}/${key}: ${String(err)}`, { bucket, key });
    }
    log.debug(`stored ${bucket}/${key}`, { bytes: data.byteLength, contentType });
    return `local://${dest.split(path.sep).join("/")}`;
  }

  async get(bucket: string, key: string): Promise<Buffer | null> {
    const dest = this.resolvePath(bucket, key);
    try {
      return await fs.readFile(dest);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return null;
      }
      throw new StorageError(`Failed to read ${bucket}/${key}: ${String(err)}`, { bucket, key });
    }
  }
}
