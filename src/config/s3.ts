/**
 * S3-compatible object store clients (MinIO, R2, AWS).
 * When S3_PUBLIC_ENDPOINT is set, a second client bound to it signs read URLs
 * so that links handed to browsers use the public host.
 */

import { S3Client } from "@aws-sdk/client-s3";
import { env } from "./env.js";

function buildClient(endpoint: string): S3Client {
  return new S3Client({
    region: env.S3_REGION,
    endpoint,
    forcePathStyle: env.S3_USE_PATH_STYLE,
    credentials: {
      accessKeyId: env.S3_ACCESS_KEY,
      secretAccessKey: env.S3_SECRET_KEY,
    },
  });
}

export const S3_BUCKET = env.S3_BUCKET;

export const s3Client = buildClient(env.S3_ENDPOINT);

export const s3PresignClient = env.S3_PUBLIC_ENDPOINT ? buildClient(env.S3_PUBLIC_ENDPOINT) : s3Client;
