import { BAD_FILE_MODE, FILE_ALREADY_EXISTS, FILE_ALREADY_OPEN, FILE_NOT_FOUND, INPUT_PAST_END, IOError } from "./Errors.ts";
import { FileAccessor, Handle, Opener, OpenMode } from "./Files.ts";
import { DevicePrinter, UNLIMITED_WIDTH } from "./Printer.ts";

export interface Disk extends Opener {
  exists(path: string): boolean;
  readText(path: string): string;
  writeText(path: string, text: string): void;
  remove(path: string): void;
  rename(oldPath: string, newPath: string): void;
}

export interface DiskFile {
  name: string;
  bytes: number[];
}

// A flat in-memory drive.  Paths are used as given.
export class MemoryDrive implements Disk {
  files: Map<string, DiskFile> = new Map();
  handles: Map<string, Handle> = new Map();

  exists(path: string): boolean {
    return this.files.has(path);
  }

  readText(path: string): string {
    return bytesToString(this.lookupOrThrow(path).bytes);
  }

  writeText(path: string, text: string) {
    this.files.set(path, {name: path, bytes: stringToBytes(text)});
  }

  remove(path: string) {
    this.lookupOrThrow(path);
    if (this.handles.has(path)) {
      throw new IOError(FILE_ALREADY_OPEN);
    }
    this.files.delete(path);
  }

  rename(oldPath: string, newPath: string) {
    const entry = this.lookupOrThrow(oldPath);
    if (this.files.has(newPath)) {
      throw new IOError(FILE_ALREADY_EXISTS);
    }
    this.files.delete(oldPath);
    entry.name = newPath;
    this.files.set(newPath, entry);
  }

  open(path: string, mode: OpenMode, recordLength?: number): Handle {
    if (this.handles.has(path)) {
      throw new IOError(FILE_ALREADY_OPEN);
    }
    let file = this.files.get(path);
    if (!file || mode === OpenMode.OUTPUT) {
      if (mode === OpenMode.INPUT) {
        throw new IOError(FILE_NOT_FOUND);
      }
      file = {name: path, bytes: []};
      this.files.set(path, file);
      }
    const handle: Handle = {
      owner: this,
      path,
      accessor: new BufferFileAccessor(file.bytes, mode, recordLength ?? 1),
    };
    this.handles.set(path, handle);
    return handle;
  }

  close(handle: Handle) {
    this.handles.delete(handle.path);
  }

  private lookupOrThrow(path: string): DiskFile {
    const file = this.files.get(path);
    if (!file) {
      throw new IOError(FILE_NOT_FOUND);
    }
    return file;
  }
}

// Reads and writes an in-memory byte array.  Back ends that persist files
// elsewhere pass onChange to learn when the bytes changed.
export class BufferFileAccessor extends DevicePrinter implements FileAccessor {
  bytes: number[];
  mode: OpenMode;
  recordLength: number;
  position: number;
  lastAccessPosition = 0;
  onChange?: () => void;

  constructor(bytes: number[], mode: OpenMode, recordLength: number, onChange?: () => void) {
    super(UNLIMITED_WIDTH);
    this.bytes = bytes;
    this.mode = mode;
    this.recordLength = recordLength;
    this.onChange = onChange;
    this.position = mode === OpenMode.APPEND ? bytes.length : 0;
  }

  openMode(): OpenMode {
    return this.mode;
  }

  protected override emit(ch: string) {
    if (this.mode === OpenMode.RANDOM) {
      return;
    }
    if (this.mode === OpenMode.INPUT) {
      throw new IOError(BAD_FILE_MODE);
    }
    this.bytes.splice(this.position, 1, ch.charCodeAt(0) & 0xff);
    this.lastAccessPosition = this.position;
    this.position++;
    this.onChange?.();
  }

  readChars(numBytes: number): string {
    if (this.mode !== OpenMode.INPUT) {
      throw new IOError(BAD_FILE_MODE);
    }
    if (this.position + numBytes > this.bytes.length) {
      throw new IOError(INPUT_PAST_END);
    }
    const start = this.position;
    this.lastAccessPosition = this.position + numBytes - 1;
    this.position += numBytes;
    return bytesToString(this.bytes.slice(start, this.position));
  }

  readLine(): string {
    if (this.mode !== OpenMode.INPUT) {
      throw new IOError(BAD_FILE_MODE);
    }
    if (this.eof()) {
      throw new IOError(INPUT_PAST_END);
    }
    const start = this.position;
    let end = this.position;
    while (this.position < this.bytes.length) {
      const byte = this.bytes[this.position];
      if (byte === 13) {
        this.position += this.bytes[this.position + 1] === 10 ? 2 : 1;
        break;
      }
      if (byte === 10) {
        this.position++;
        break;
      }
      end++;
      this.position++;
    }
    this.lastAccessPosition = this.position - 1;
    return bytesToString(this.bytes.slice(start, end));
  }

  readRecord(offset: number, length: number): number[] {
    if (this.mode !== OpenMode.RANDOM) {
      throw new IOError(BAD_FILE_MODE);
    }
    const record: number[] = new Array(length).fill(32);
    for (let i = 0; i < length && offset + i < this.bytes.length; i++) {
      record[i] = this.bytes[offset + i];
    }
    this.lastAccessPosition = offset;
    this.position = offset + length;
    return record;
  }

  writeRecord(offset: number, bytes: number[]) {
    if (this.mode !== OpenMode.RANDOM) {
      throw new IOError(BAD_FILE_MODE);
    }
    while (this.bytes.length < offset) {
      this.bytes.push(0);
    }
    this.bytes.splice(offset, bytes.length, ...bytes);
    this.lastAccessPosition = offset;
    this.position = offset + bytes.length;
    this.onChange?.();
  }

  length(): number {
    return this.bytes.length;
  }

  eof(): boolean {
    return this.position >= this.bytes.length;
  }

  getLoc(): number {
    if (this.mode === OpenMode.RANDOM) {
      return Math.floor(this.lastAccessPosition / this.recordLength) + 1;
    }
    return Math.floor(this.position / 128);
  }
}

export function stringToBytes(text: string): number[] {
  return Array.from(text, (ch) => ch.charCodeAt(0) & 0xff);
}

export function bytesToString(bytes: number[]): string {
  let text = '';
  for (let i = 0; i < bytes.length; i += 4096) {
    text += String.fromCharCode(...bytes.slice(i, i + 4096));
  }
  return text;
}
