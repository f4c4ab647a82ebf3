import { existsSync } from "node:fs";
import { copyFile, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

// assets/ sits at the package root; compiled code runs one level deeper under dist/
const ASSET_DIRS = [path.resolve(__dirname, "..", "..", "assets"), path.resolve(__dirname, "..", "..", "..", "assets")];

export function assetPath(name: string): string {
  const found = ASSET_DIRS.map((dir) => path.join(dir, name)).find((file) => existsSync(file));
  if (!found) {
    throw new Error(`asset not found: ${name}`);
  }
  return found;
}

/** Copy a bundled asset into `dir` as `fileName`, creating the directory when needed. */
export async function copyAsset(name: string, dir: string, fileName: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const dest = path.join(dir, fileName);
  await copyFile(assetPath(name), dest);
  return dest;
}

export async function writeTextFile(dir: string, fileName: string, content: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const dest = path.join(dir, fileName);
  await writeFile(dest, content.endsWith("\n") ? content : content + "\n", "utf8");
  return dest;
}
