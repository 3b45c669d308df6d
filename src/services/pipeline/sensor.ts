/**
 * File-watch sensor
 *
 * Polls a directory for METS documents and turns each one into a run
 * request keyed by file name. The polling wrapper remembers the run keys it
 * has already emitted, so a file triggers at most one run per sensor.
 *
 * @module services/pipeline/sensor
 */

import fs from 'fs';
import path from 'path';

export interface RunRequest {
  /** Stable per file: 'xml_file_' + file name */
  readonly runKey: string;
  /** Absolute path of the one document to run */
  readonly paths: readonly string[];
}

export type SensorScanResult =
  | { readonly kind: 'skip'; readonly reason: string }
  | { readonly kind: 'requests'; readonly requests: readonly RunRequest[] };

function errorCode(error: unknown): string | undefined {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

function runKeyFor(fileName: string): string {
  return `xml_file_${fileName}`;
}

/**
 * List run requests for every matching file in the directory, sorted by name.
 * A missing directory or one without matches is a skip, not an error.
 *
 * @param directory - Directory to scan
 * @param extension - File extension including the dot, matched case-insensitively
 */
export async function scanWatchDirectory(
  directory: string,
  extension: string
): Promise<SensorScanResult> {
  const absolute = path.resolve(directory);

  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(absolute, { withFileTypes: true });
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return { kind: 'skip', reason: `Watch directory ${absolute} does not exist` };
    }
    throw error;
  }

  const suffix = extension.toLowerCase();
  const names = entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(suffix))
    .map((entry) => entry.name)
    .sort();

  if (names.length === 0) {
    return { kind: 'skip', reason: `No ${extension} files found in ${absolute}` };
  }

  return {
    kind: 'requests',
    requests: names.map((name) => ({
      runKey: runKeyFor(name),
      paths: [path.join(absolute, name)],
    })),
  };
}

export interface FileWatchSensorOptions {
  directory: string;
  extension: string;
  intervalMs: number;
  /** Keep the process alive while the timer runs; default false */
  keepAlive?: boolean;
  /** Called once per new run key; a failed run is logged, not retried */
  onRunRequest: (request: RunRequest) => Promise<void> | void;
}

export class FileWatchSensor {
  private readonly seenKeys = new Set<string>();
  private timer: NodeJS.Timeout | null = null;
  private polling: Promise<RunRequest[]> | null = null;

  constructor(private readonly options: FileWatchSensorOptions) {}

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Scan once and dispatch run requests whose keys have not been seen
   *
   * @returns The requests dispatched by this poll
   */
  async poll(): Promise<RunRequest[]> {
    if (this.polling !== null) {
      return this.polling;
    }
    this.polling = this.pollOnce();
    try {
      return await this.polling;
    } finally {
      this.polling = null;
    }
  }

  private async pollOnce(): Promise<RunRequest[]> {
    const result = await scanWatchDirectory(this.options.directory, this.options.extension);
    if (result.kind === 'skip') {
      console.error(`[Sensor] Skipped: ${result.reason}`);
      return [];
    }

    const fresh = result.requests.filter((request) => !this.seenKeys.has(request.runKey));
    for (const request of fresh) {
      this.seenKeys.add(request.runKey);
      console.error(`[Sensor] Run requested: ${request.runKey}`);
      try {
        await this.options.onRunRequest(request);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Sensor] Run ${request.runKey} failed: ${message}`);
      }
    }
    return fresh;
  }

  /**
   * Poll immediately, then at the configured interval. Unless keepAlive is set
   * the timer does not keep the process alive on its own.
   */
  start(): void {
    if (this.timer !== null) {
      return;
    }
    console.error(
      `[Sensor] Watching ${path.resolve(this.options.directory)} for ${this.options.extension} ` +
        `files every ${this.options.intervalMs}ms`
    );
    this.timer = setInterval(() => this.pollAndLog(), this.options.intervalMs);
    if (this.options.keepAlive !== true) {
      this.timer.unref();
    }
    this.pollAndLog();
  }

  private pollAndLog(): void {
    this.poll().catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Sensor] Poll failed: ${message}`);
    });
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
      console.error('[Sensor] Stopped');
    }
  }
}
