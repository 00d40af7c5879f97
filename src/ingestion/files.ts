import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

export type DiscoverOptions = {
  root: string;
  includeExts: readonly string[];
};

/** `relPath` is relative to the discovery root with `/` separators, so it is stable across machines. */
export type FoundFile = { path: string; relPath: string };

/** Recursive, ordered by `relPath`, skips dotfiles and dot-directories. Missing root → empty list. */
export async function discoverFiles(opts: DiscoverOptions): Promise<FoundFile[]> {
  const exts = new Set(opts.includeExts.map((e) => e.toLowerCase()));
  const out: FoundFile[] = [];
  const pending = [opts.root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (dir === opts.root && isMissing(err)) return [];
      throw err;
    }
    for (const ent of entries) {
      if (ent.name.startsWith(".")) continue;
      const full = path.join(dir, ent.name);
      if (ent.isDirectory()) pending.push(full);
      else if (ent.isFile() && exts.has(path.extname(ent.name).toLowerCase())) {
        out.push({ path: full, relPath: path.relative(opts.root, full).split(path.sep).join("/") });
      }
    }
  }

  return out.sort((a, b) => (a.relPath < b.relPath ? -1 : a.relPath > b.relPath ? 1 : 0));
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
