import fs from "node:fs/promises";
import path from "node:path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function readTextFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, { encoding: "utf8" });
}

export async function filesHaveSameContent(a: string, b: string): Promise<boolean> {
  const [statA, statB] = await Promise.all([fs.stat(a), fs.stat(b)]);
  if (statA.size !== statB.size) return false;
  const [bufA, bufB] = await Promise.all([fs.readFile(a), fs.readFile(b)]);
  return bufA.equals(bufB);
}

// Replaces `filePath` as a whole through a sibling temp file and a rename.
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const absolutePath = path.resolve(filePath);
  const dir = path.dirname(absolutePath);
  await ensureDir(dir);
  const tmpPath = path.join(dir, `.${path.basename(absolutePath)}.tmp-${process.pid}`);
  try {
    await fs.writeFile(tmpPath, contents, { encoding: "utf8" });
    await fs.rename(tmpPath, absolutePath);
  } finally {
    await fs.unlink(tmpPath).catch(() => {});
  }
}
