import { access, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export interface DownloadOptions {
  /** Download even when the target already exists. */
  force?: boolean;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Downloads `url` to `path`, creating parent directories.
 *
 * Returns true when the file is available locally afterwards: already cached
 * (unless `force`) or downloaded. A non-2xx response returns false and writes
 * nothing. Network errors propagate.
 */
export async function downloadFile(url: string, path: string, options: DownloadOptions = {}): Promise<boolean> {
  if (!options.force && (await exists(path))) {
    return true;
  }

  const response = await fetch(url);
  if (!response.ok) {
    return false;
  }

  const body = Buffer.from(await response.arrayBuffer());
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, body);
  return true;
}
