/**
 * Storage path utilities for consistent object key organization.
 * Structure: jobs/{jobId}.mp3
 */
export const StoragePaths = {
  /** Converted audio for a job. Deterministic so redelivered tasks overwrite the same object. */
  jobAudio: (jobId: string) => `jobs/${jobId}.mp3`,

  /** Filename suggested to browsers when downloading a job's audio. */
  downloadFilename: (jobId: string) => `audio-${jobId}.mp3`,
} as const;

export type ResultLocation = { kind: "key"; key: string } | { kind: "url"; url: string };

/**
 * Interprets a stored result reference.
 * Current rows hold an object key; older rows may hold an absolute URL, which is
 * mapped back to a key when it points into `bucket` (path-style or virtual-host style).
 * Returns null for an empty reference.
 */
export function resolveResultRef(ref: string | null, bucket: string): ResultLocation | null {
  const raw = ref?.trim();
  if (!raw) {
    return null;
  }
  if (!/^https?:\/\//i.test(raw)) {
    return { kind: "key", key: raw };
  }

  const key = objectKeyFromUrl(raw, bucket);
  return key ? { kind: "key", key } : { kind: "url", url: raw };
}

function objectKeyFromUrl(raw: string, bucket: string): string | null {
  if (!bucket.trim()) {
    return null;
  }
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return null;
  }

  let path: string;
  try {
    path = decodeURIComponent(url.pathname.replace(/^\//, ""));
  } catch {
    // Malformed escapes cannot name one of our keys.
    return null;
  }
  if (url.host.startsWith(`${bucket}.`)) {
    return path || null;
  }
  const [first, ...rest] = path.split("/");
  if (first === bucket && rest.length > 0 && rest.join("/") !== "") {
    return rest.join("/");
  }
  return null;
}
