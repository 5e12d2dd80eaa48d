/**
 * Default IStorage implementation using Node.js fs
 */

import {
  readFileSync,
  writeFileSync,
  existsSync,
  mkdirSync,
  unlinkSync,
  openSync,
  writeSync,
  closeSync,
  renameSync,
  chmodSync,
  readdirSync,
  statSync,
  realpathSync,
  rmSync,
} from 'fs';
import type { FileStat, IStorage } from '../types/interfaces.js';

export class FileStorage implements IStorage {
  readFile(path: string, encoding: BufferEncoding): string {
    return readFileSync(path, encoding);
  }

  readBuffer(path: string): Buffer {
    return readFileSync(path);
  }

  writeFile(path: string, data: string | Buffer): void {
    writeFileSync(path, data);
  }

  exists(path: string): boolean {
    return existsSync(path);
  }

  mkdirp(path: string): void {
    mkdirSync(path, { recursive: true });
  }

  unlink(path: string): void {
    unlinkSync(path);
  }

  openSync(path: string, flags: string): number {
    return openSync(path, flags);
  }

  writeSync(fd: number, data: string): void {
    writeSync(fd, data);
  }

  closeSync(fd: number): void {
    closeSync(fd);
  }

  rename(from: string, to: string): void {
    renameSync(from, to);
  }

  chmod(path: string, mode: number): void {
    chmodSync(path, mode);
  }

  readdir(path: string): string[] {
    return readdirSync(path);
  }

  stat(path: string): FileStat {
    const stat = statSync(path);
    return { isDirectory: stat.isDirectory(), isFile: stat.isFile(), mtimeMs: stat.mtimeMs };
  }

  realpath(path: string): string {
    return realpathSync(path);
  }

  remove(path: string): void {
    rmSync(path, { recursive: true, force: true });
  }
}
