import * as fs from "node:fs";
import * as path from "node:path";
import { DISK_IO_ERROR, FILE_ALREADY_EXISTS, FILE_ALREADY_OPEN, FILE_NOT_FOUND, IOError } from "./Errors.ts";
import { Handle, OpenMode } from "./Files.ts";
import { BufferFileAccessor, Disk, bytesToString, stringToBytes } from "./Disk.ts";

interface NodeFile {
  handle: Handle;
  bytes: number[];
  dirty: boolean;
}

// Files on the host file system, resolved against a base directory.  Open
// files are read into memory and written back when they are closed.
export class NodeDrive implements Disk {
  private openFiles: Map<string, NodeFile> = new Map();

  constructor(private baseDirectory: string = process.cwd()) {
  }

  private resolve(name: string): string {
    return path.resolve(this.baseDirectory, name);
  }

  exists(name: string): boolean {
    return fs.existsSync(this.resolve(name));
  }

  readText(name: string): string {
    return bytesToString([...this.readBytes(this.resolve(name))]);
  }

  writeText(name: string, text: string) {
    this.writeBytes(this.resolve(name), stringToBytes(text));
  }

  remove(name: string) {
    const target = this.resolve(name);
    if (this.openFiles.has(target)) {
      throw new IOError(FILE_ALREADY_OPEN);
    }
    try {
      fs.unlinkSync(target);
    } catch (e: unknown) {
      throw toIOError(e);
    }
  }

  rename(oldName: string, newName: string) {
    const source = this.resolve(oldName);
    const target = this.resolve(newName);
    if (!fs.existsSync(source)) {
      throw new IOError(FILE_NOT_FOUND);
    }
    if (fs.existsSync(target)) {
      throw new IOError(FILE_ALREADY_EXISTS);
    }
    try {
      fs.renameSync(source, target);
    } catch (e: unknown) {
      throw toIOError(e);
    }
  }

  open(name: string, mode: OpenMode, recordLength?: number): Handle {
    const target = this.resolve(name);
    if (this.openFiles.has(target)) {
      throw new IOError(FILE_ALREADY_OPEN);
    }
    let bytes: number[] = [];
    const exists = fs.existsSync(target);
    if (mode === OpenMode.INPUT && !exists) {
      throw new IOError(FILE_NOT_FOUND);
    }
    if (exists && mode !== OpenMode.OUTPUT) {
      bytes = [...this.readBytes(target)];
    }
    const file: NodeFile = {
      handle: {owner: this, path: target, accessor: new BufferFileAccessor(bytes, mode, recordLength ?? 1, () => {
        file.dirty = true;
      })},
      bytes,
      dirty: !exists || mode === OpenMode.OUTPUT,
    };
    this.openFiles.set(target, file);
    return file.handle;
  }

  close(handle: Handle) {
    const file = this.openFiles.get(handle.path);
    if (!file) {
      return;
    }
    this.openFiles.delete(handle.path);
    if (file.dirty) {
      this.writeBytes(handle.path, file.bytes);
    }
  }

  private readBytes(target: string): Uint8Array {
    try {
      return fs.readFileSync(target);
    } catch (e: unknown) {
      throw toIOError(e);
    }
  }

  private writeBytes(target: string, bytes: number[]) {
    try {
      fs.writeFileSync(target, Uint8Array.from(bytes));
    } catch (e: unknown) {
      throw toIOError(e);
    }
  }
}

function toIOError(e: unknown): IOError {
  if (e instanceof Error && 'code' in e && (e.code === 'ENOENT' || e.code === 'EISDIR')) {
    return new IOError(FILE_NOT_FOUND);
  }
  return new IOError(DISK_IO_ERROR);
}
