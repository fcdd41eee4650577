import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export function safeResolvePath(rootDir: string, relativePath: string): string {
  const normalized = relativePath.replace(/^\/+/, "");
  const candidate = path.resolve(rootDir, normalized);
  const safeRoot = `${path.resolve(rootDir)}${path.sep}`;

  if (candidate !== path.resolve(rootDir) && !candidate.startsWith(safeRoot)) {
    throw new Error(`Unsafe path: ${relativePath}`);
  }

  return candidate;
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes to a sibling temp file and renames it into place, so a concurrent
 * reader sees either the previous file or the complete new one.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;

  try {
    await fs.writeFile(tempPath, content, { encoding: "utf8", flag: "wx" });
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function copyTree(sourceDir: string, targetDir: string): Promise<void> {
  await ensureDir(path.dirname(targetDir));
  await fs.cp(sourceDir, targetDir, { recursive: true, errorOnExist: true, force: false });
}

export function compareNormalizedPaths(left: string, right: string): number {
  const normalizedLeft = left.normalize("NFC").replaceAll("\\", "/");
  const normalizedRight = right.normalize("NFC").replaceAll("\\", "/");

  if (normalizedLeft < normalizedRight) {
    return -1;
  }
  if (normalizedLeft > normalizedRight) {
    return 1;
  }
  return 0;
}

export function toPosixPath(value: string): string {
  return value.replaceAll("\\", "/");
}

/** Relative posix paths of every regular file under rootDir, depth-first by name. */
export async function listFilesRecursive(rootDir: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries.sort((a, b) => compareNormalizedPaths(a.name, b.name))) {
      const absolute = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        await walk(absolute);
      } else if (entry.isFile()) {
        files.push(toPosixPath(path.relative(rootDir, absolute)));
      }
    }
  }

  if (await pathExists(rootDir)) {
    await walk(rootDir);
  }

  return files;
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}
