import fs from "node:fs";
import path from "node:path";

export function toErrorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && (error as NodeJS.ErrnoException).code === code;
}

export function ensureDirectory(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

function atomicTempPath(filePath: string): string {
  const suffix = `${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2)}`;
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.tmp-${suffix}`);
}

/** Writes through a dot-prefixed sibling and a rename; readers never see a partial file. */
export function writeTextAtomic(filePath: string, content: string): void {
  ensureDirectory(path.dirname(filePath));
  const tempPath = atomicTempPath(filePath);
  try {
    fs.writeFileSync(tempPath, content, "utf8");
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

export function isDirectoryEmpty(dirPath: string): boolean {
  return fs.readdirSync(dirPath).length === 0;
}
