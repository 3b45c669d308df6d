/**
 * Unit tests for the file-watch sensor
 *
 * @see src/services/pipeline/sensor.ts
 */

import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  vi,
  fs,
  path,
  createTempDir,
  removeTempDir,
  FileWatchSensor,
  scanWatchDirectory,
  type RunRequest,
} from './helpers.js';

describe('scanWatchDirectory', () => {
  let watchDir: string;

  beforeEach(() => {
    watchDir = createTempDir('sensor-scan');
  });

  afterEach(() => {
    removeTempDir(watchDir);
  });

  it('should request one run per matching file, sorted by name', async () => {
    fs.writeFileSync(path.join(watchDir, 'b.xml'), '<mets/>');
    fs.writeFileSync(path.join(watchDir, 'a.XML'), '<mets/>');
    fs.writeFileSync(path.join(watchDir, 'notes.txt'), 'ignored');
    fs.mkdirSync(path.join(watchDir, 'c.xml'));

    const result = await scanWatchDirectory(watchDir, '.xml');
    expect(result).toEqual({
      kind: 'requests',
      requests: [
        { runKey: 'xml_file_a.XML', paths: [path.join(watchDir, 'a.XML')] },
        { runKey: 'xml_file_b.xml', paths: [path.join(watchDir, 'b.xml')] },
      ],
    });
  });

  it('should skip when no file matches', async () => {
    fs.writeFileSync(path.join(watchDir, 'notes.txt'), 'ignored');
    expect(await scanWatchDirectory(watchDir, '.xml')).toEqual({
      kind: 'skip',
      reason: `No .xml files found in ${watchDir}`,
    });
  });

  it('should skip when the directory does not exist', async () => {
    const missing = path.join(watchDir, 'missing');
    expect(await scanWatchDirectory(missing, '.xml')).toEqual({
      kind: 'skip',
      reason: `Watch directory ${missing} does not exist`,
    });
  });

  it('should skip when the path is a file', async () => {
    const filePath = path.join(watchDir, 'a.xml');
    fs.writeFileSync(filePath, '<mets/>');
    expect(await scanWatchDirectory(filePath, '.xml')).toEqual({
      kind: 'skip',
      reason: `Watch directory ${filePath} does not exist`,
    });
  });
});

describe('FileWatchSensor', () => {
  let watchDir: string;
  let sensor: FileWatchSensor | null;

  beforeEach(() => {
    watchDir = createTempDir('sensor');
    sensor = null;
  });

  afterEach(() => {
    sensor?.stop();
    removeTempDir(watchDir);
  });

  function createSensor(onRunRequest: (request: RunRequest) => Promise<void>): FileWatchSensor {
    sensor = new FileWatchSensor({ directory: watchDir, extension: '.xml', intervalMs: 60_000, onRunRequest });
    return sensor;
  }

  it('should dispatch each file once', async () => {
    const onRunRequest = vi.fn<(request: RunRequest) => Promise<void>>().mockResolvedValue(undefined);
    const watcher = createSensor(onRunRequest);
    fs.writeFileSync(path.join(watchDir, 'a.xml'), '<mets/>');
    fs.writeFileSync(path.join(watchDir, 'b.xml'), '<mets/>');

    const first = await watcher.poll();
    expect(first.map((request) => request.runKey)).toEqual(['xml_file_a.xml', 'xml_file_b.xml']);
    expect(onRunRequest).toHaveBeenCalledTimes(2);

    expect(await watcher.poll()).toEqual([]);
    expect(onRunRequest).toHaveBeenCalledTimes(2);

    fs.writeFileSync(path.join(watchDir, 'c.xml'), '<mets/>');
    const third = await watcher.poll();
    expect(third.map((request) => request.runKey)).toEqual(['xml_file_c.xml']);
    expect(onRunRequest).toHaveBeenCalledTimes(3);
  });

  it('should share one scan between concurrent polls', async () => {
    const onRunRequest = vi.fn<(request: RunRequest) => Promise<void>>().mockResolvedValue(undefined);
    const watcher = createSensor(onRunRequest);
    fs.writeFileSync(path.join(watchDir, 'a.xml'), '<mets/>');

    const [first, second] = await Promise.all([watcher.poll(), watcher.poll()]);
    expect(first).toEqual(second);
    expect(onRunRequest).toHaveBeenCalledTimes(1);
  });

  it('should not retry a failed run', async () => {
    const onRunRequest = vi
      .fn<(request: RunRequest) => Promise<void>>()
      .mockRejectedValue(new Error('Intellectual Entity "IE1" has no DMDID attribute'));
    const watcher = createSensor(onRunRequest);
    fs.writeFileSync(path.join(watchDir, 'a.xml'), '<mets/>');

    expect((await watcher.poll()).map((request) => request.runKey)).toEqual(['xml_file_a.xml']);
    expect(await watcher.poll()).toEqual([]);
    expect(onRunRequest).toHaveBeenCalledTimes(1);
  });

  it('should return no requests when the directory is missing', async () => {
    const onRunRequest = vi.fn<(request: RunRequest) => Promise<void>>().mockResolvedValue(undefined);
    sensor = new FileWatchSensor({
      directory: path.join(watchDir, 'missing'),
      extension: '.xml',
      intervalMs: 60_000,
      onRunRequest,
    });
    expect(await sensor.poll()).toEqual([]);
    expect(onRunRequest).not.toHaveBeenCalled();
  });

  it('should poll immediately on start and stop on request', async () => {
    const onRunRequest = vi.fn<(request: RunRequest) => Promise<void>>().mockResolvedValue(undefined);
    const watcher = createSensor(onRunRequest);
    fs.writeFileSync(path.join(watchDir, 'a.xml'), '<mets/>');

    watcher.start();
    expect(watcher.running).toBe(true);
    await vi.waitFor(() => {
      expect(onRunRequest).toHaveBeenCalledTimes(1);
    });

    watcher.stop();
    expect(watcher.running).toBe(false);
  });
});
