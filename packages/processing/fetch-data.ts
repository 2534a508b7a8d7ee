import fs from "fs";
import { mkdir, rename, rm } from "node:fs/promises";
import path from "path";
import { Readable, Transform } from "stream";
import { pipeline } from "stream/promises";
import { FetchError } from "./errors";
import { fileSize, formatElapsed, formatHumanReadableBytes, pathExists } from "./utils";

export const DEFAULT_FETCH_TIMEOUT_MS = 60_000;

/**
 * Makes sure `localPath` exists, downloading `remoteUrl` into it if it does not.
 * An existing file is trusted as-is and never re-downloaded.
 *
 * The body streams into `<localPath>.part` and is renamed on completion, so an
 * interrupted download never leaves a file that a later run would skip over.
 *
 * `timeoutMs` is an idle timeout: it bounds the wait for the response headers
 * and then the gap between body chunks, not the length of the whole transfer.
 */
export async function ensureLocal(
  remoteUrl: string,
  localPath: string,
  options: { timeoutMs?: number } = {}
): Promise<void> {
  if (await pathExists(localPath)) return;

  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const partPath = `${localPath}.part`;
  await mkdir(path.dirname(localPath), { recursive: true });

  console.log(`[Fetch] ${remoteUrl} -> ${localPath}`);
  const startTime = Date.now();

  const idle = new IdleTimeout(timeoutMs);
  try {
    await download(remoteUrl, partPath, localPath, idle);
  } finally {
    idle.clear();
  }

  console.log(
    `[Fetch] Saved ${formatHumanReadableBytes(fileSize(localPath))} in ${formatElapsed(startTime)}`
  );
}

async function download(
  remoteUrl: string,
  partPath: string,
  localPath: string,
  idle: IdleTimeout
): Promise<void> {
  const { timeoutMs } = idle;

  let response: Response;
  try {
    idle.arm();
    response = await fetch(remoteUrl, { signal: idle.signal });
  } catch (err) {
    throw new FetchError({
      url: remoteUrl,
      message: idle.timedOut || isTimeout(err)
        ? `Timed out after ${timeoutMs}ms fetching ${remoteUrl}`
        : `Network error fetching ${remoteUrl}`,
      cause: err,
    });
  }

  if (!response.ok || !response.body) {
    throw new FetchError({
      url: remoteUrl,
      status: response.status,
      message: `Fetching ${remoteUrl} failed with status ${response.status}`,
    });
  }

  try {
    idle.arm();
    const body = Readable.fromWeb(response.body);
    const rearm = new Transform({
      transform(chunk, _encoding, callback) {
        idle.arm();
        callback(null, chunk);
      },
    });
    await pipeline(body, rearm, fs.createWriteStream(partPath), { signal: idle.signal });
    await rename(partPath, localPath);
  } catch (err) {
    await rm(partPath, { force: true });
    throw new FetchError({
      url: remoteUrl,
      status: response.status,
      message: idle.timedOut || isTimeout(err)
        ? `Timed out after ${timeoutMs}ms downloading ${remoteUrl}`
        : `Download of ${remoteUrl} was interrupted`,
      cause: err,
    });
  }
}

// Aborts once `timeoutMs` passes without a call to arm()
class IdleTimeout {
  private readonly controller = new AbortController();
  private timer: NodeJS.Timeout | undefined;
  timedOut = false;

  constructor(readonly timeoutMs: number) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  arm(): void {
    clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, this.timeoutMs);
  }

  clear(): void {
    clearTimeout(this.timer);
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}
