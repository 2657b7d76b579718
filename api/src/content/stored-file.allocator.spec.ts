import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { ConfigService } from '@nestjs/config';
import { StorageFault } from '../common/errors';
import { StoredFileAllocator, extensionOf } from './stored-file.allocator';

const mockNextUuid = jest.fn<string, []>();
jest.mock('uuid', () => ({ v4: () => mockNextUuid() }));

describe('extensionOf', () => {
  it.each([
    ['cat.png', '.png'],
    ['Holiday.JPEG', '.jpeg'],
    ['archive.tar.gz', '.gz'],
    ['../../etc/passwd', ''],
    ['README', ''],
    ['.bashrc', ''],
    ['weird.p$g', ''],
    ['long.abcdefghijklmnopq', ''],
  ])('%s -> "%s"', (original, expected) => {
    expect(extensionOf(original)).toBe(expected);
  });
});

describe('StoredFileAllocator', () => {
  let root: string;
  let allocator: StoredFileAllocator;

  beforeEach(async () => {
    mockNextUuid.mockReset();
    mockNextUuid.mockImplementation(() => randomUUID());
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'allocator-'));
    allocator = new StoredFileAllocator(new ConfigService({ storage: { root } }));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  // FileHandle 메서드는 프로토타입에 있으므로 실제 핸들에서 꺼내 스파이
  async function fileHandlePrototype() {
    const scratch = path.join(os.tmpdir(), `handle-${randomUUID()}`);
    const handle = await fs.open(scratch, 'w');
    const prototype = Object.getPrototypeOf(handle);
    await handle.close();
    await fs.unlink(scratch);
    return prototype;
  }

  it('writes the bytes under <prefix><uuid><extension>', async () => {
    const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47]);

    const name = await allocator.place('photo-', 'cat.png', bytes);

    expect(name).toMatch(/^photo-[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}\.png$/);
    await expect(fs.readFile(path.join(root, name))).resolves.toEqual(bytes);
  });

  it('gives identical original names distinct stored names', async () => {
    const first = await allocator.place('upload-', 'notes.txt', Buffer.from('one'));
    const second = await allocator.place('upload-', 'notes.txt', Buffer.from('two'));

    expect(first).not.toBe(second);
    await expect(fs.readFile(path.join(root, first), 'utf-8')).resolves.toBe('one');
    await expect(fs.readFile(path.join(root, second), 'utf-8')).resolves.toBe('two');
  });

  it('creates the storage root when missing', async () => {
    const nested = path.join(root, 'a', 'b');
    const nestedAllocator = new StoredFileAllocator(new ConfigService({ storage: { root: nested } }));

    const name = await nestedAllocator.place('upload-', 'x.bin', Buffer.from('x'));

    await expect(fs.readdir(nested)).resolves.toEqual([name]);
  });

  it('keeps stored names inside the root', () => {
    expect(allocator.pathOf('../escape.png')).toBe(path.join(root, 'escape.png'));
  });

  it('removes files and ignores ones already gone', async () => {
    const name = await allocator.place('upload-', 'x.bin', Buffer.from('x'));

    await allocator.remove(name);
    await allocator.remove(name);

    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it('skips a name that already exists and leaves that file alone', async () => {
    await fs.writeFile(path.join(root, 'upload-taken.txt'), 'original');
    mockNextUuid.mockReturnValueOnce('taken').mockReturnValueOnce('fresh');

    const name = await allocator.place('upload-', 'notes.txt', Buffer.from('new'));

    expect(name).toBe('upload-fresh.txt');
    await expect(fs.readFile(path.join(root, 'upload-taken.txt'), 'utf-8')).resolves.toBe(
      'original',
    );
    await expect(fs.readFile(path.join(root, 'upload-fresh.txt'), 'utf-8')).resolves.toBe('new');
  });

  it('gives up with StorageFault when every name collides', async () => {
    await fs.writeFile(path.join(root, 'upload-taken.txt'), 'original');
    mockNextUuid.mockReturnValue('taken');

    await expect(
      allocator.place('upload-', 'notes.txt', Buffer.from('new')),
    ).rejects.toBeInstanceOf(StorageFault);

    expect(mockNextUuid).toHaveBeenCalledTimes(5);
    await expect(fs.readdir(root)).resolves.toEqual(['upload-taken.txt']);
    await expect(fs.readFile(path.join(root, 'upload-taken.txt'), 'utf-8')).resolves.toBe(
      'original',
    );
  });

  it('removes the file and raises StorageFault when writing fails', async () => {
    const prototype = await fileHandlePrototype();
    jest.spyOn(prototype, 'writeFile').mockRejectedValueOnce(new Error('disk full'));

    await expect(
      allocator.place('upload-', 'notes.txt', Buffer.from('new')),
    ).rejects.toBeInstanceOf(StorageFault);

    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it('removes the file and raises StorageFault when closing fails', async () => {
    const prototype = await fileHandlePrototype();
    const close = prototype.close;
    jest.spyOn(prototype, 'close').mockImplementationOnce(async function (this: unknown) {
      await close.call(this);
      throw new Error('close failed');
    });

    await expect(
      allocator.place('upload-', 'notes.txt', Buffer.from('new')),
    ).rejects.toBeInstanceOf(StorageFault);

    await expect(fs.readdir(root)).resolves.toEqual([]);
  });
});
