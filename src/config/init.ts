/**
 * Application Initialization
 * Ensures the object-store bucket exists on startup.
 *
 * Note: Schema migrations should be run separately via:
 *   npx supabase db push
 */

import { CreateBucketCommand, HeadBucketCommand, type S3Client } from "@aws-sdk/client-s3";
import { errorText } from "../utils/errorMessages.js";

/**
 * Creates the bucket if HeadBucket says it is missing.
 * Idempotent operation - safe to call multiple times.
 */
export async function ensureBucket(client: S3Client, bucket: string): Promise<void> {
  try {
    await client.send(new HeadBucketCommand({ Bucket: bucket }));
    console.log(`✓ Storage bucket exists: ${bucket}`);
    return;
  } catch (error) {
    console.log(`[init] Bucket ${bucket} not reachable (${errorText(error)}), creating`);
  }

  await client.send(new CreateBucketCommand({ Bucket: bucket }));
  console.log(`✓ Created storage bucket: ${bucket}`);
}

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(client: S3Client, bucket: string): Promise<void> {
  console.log("Initializing application...");

  try {
    await ensureBucket(client, bucket);
    console.log("✓ Application initialized successfully\n");
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
