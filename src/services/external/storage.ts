/**
 * Storage External Client for an S3-compatible object store
 * Thin wrapper around the AWS SDK. Uploads, time-limited signed read URLs
 * (minted at read time, never persisted) and deletes.
 */

import { readFile } from "fs/promises";
import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand, type S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";

export const DEFAULT_SIGNED_URL_TTL_SECONDS = 15 * 60;

export interface ObjectStore {
  readonly bucket: string;
  /** Uploads a local file under `key` and returns the key. */
  put(key: string, localPath: string, contentType: string, signal?: AbortSignal): Promise<string>;
  /** Signed GET URL valid for `ttlSeconds`; `filenameHint` asks browsers to save as attachment. */
  presignRead(key: string, ttlSeconds: number, filenameHint?: string): Promise<string>;
  delete(key: string): Promise<void>;
}

export interface S3ObjectStoreOptions {
  client: S3Client;
  bucket: string;
  /** Client bound to the publicly reachable endpoint, used only for signing. */
  presignClient?: S3Client;
}

function assertKey(key: string): void {
  if (!key.trim()) {
    throw new Error("object key is empty");
  }
}

export function createS3ObjectStore({ client, bucket, presignClient }: S3ObjectStoreOptions): ObjectStore {
  const signer = presignClient ?? client;

  return {
    bucket,

    async put(key, localPath, contentType, signal) {
      assertKey(key);
      const body = await readFile(localPath);
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        }),
        { abortSignal: signal }
      );
      console.log(`[storage] Uploaded ${key} (${body.length} bytes)`);
      return key;
    },

    async presignRead(key, ttlSeconds, filenameHint) {
      assertKey(key);
      const expiresIn = ttlSeconds > 0 ? ttlSeconds : DEFAULT_SIGNED_URL_TTL_SECONDS;
      const command = new GetObjectCommand({
        Bucket: bucket,
        Key: key,
        ...(filenameHint
          ? {
              ResponseContentDisposition: `attachment; filename="${filenameHint}"`,
              ResponseContentType: "audio/mpeg",
            }
          : {}),
      });
      return getSignedUrl(signer, command, { expiresIn });
    },

    async delete(key) {
      assertKey(key);
      await client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    },
  };
}
