import fs from "node:fs";
import path from "node:path";

export function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

export function ensureParentDir(filePath: string): void {
  ensureDir(path.dirname(filePath));
}

/** Sibling path used while an artifact is being written; renamed over `target` on success. */
export function tempSiblingPath(target: string): string {
  const stamp = `${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
  return path.join(path.dirname(target), `.${path.basename(target)}.${stamp}.tmp`);
}

export function replaceFile(tempPath: string, target: string): void {
  // rename is atomic on the same filesystem; readers see the old file or the new one.
  fs.renameSync(tempPath, target);
  for (const suffix of ["-wal", "-shm"]) {
    fs.rmSync(`${target}${suffix}`, { force: true });
  }
}

export function removeQuietly(filePath: string): void {
  for (const suffix of ["", "-wal", "-shm", "-journal"]) {
    fs.rmSync(`${filePath}${suffix}`, { force: true });
  }
}
