import { access, readFile } from "node:fs/promises";

export type JsonSource =
  | { status: "missing"; path: string }
  | { status: "invalid"; path: string; message: string }
  | { status: "ok"; path: string; data: unknown };

export const isMissingFile = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");

/**
 * Read and parse a JSON source. A missing file or malformed content is reported in the
 * result, so each caller decides whether that is fatal.
 */
export async function readJsonSource(file: string): Promise<JsonSource> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return { status: "missing", path: file };
    throw err;
  }
  try {
    return { status: "ok", path: file, data: JSON.parse(text.charCodeAt(0) === 0xfeff ? text.slice(1) : text) };
  } catch (err) {
    return { status: "invalid", path: file, message: err instanceof Error ? err.message : String(err) };
  }
}

export async function fileExists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch (err) {
    if (isMissingFile(err)) return false;
    throw err;
  }
}
