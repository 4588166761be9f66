import fs from "node:fs";

export const PDF_SIGNATURE = "%PDF-";

export type PdfFileState = "valid" | "missing" | "invalid";

/** Returns a reason when a file with this leading chunk and size cannot be a usable PDF, otherwise null. */
export function checkPdfHeader(header: Buffer, size: number, minBytes: number): string | null {
  if (header.subarray(0, PDF_SIGNATURE.length).toString("latin1") !== PDF_SIGNATURE) {
    return "missing %PDF- header";
  }
  if (size < minBytes) {
    return `file too small (${size} < ${minBytes} bytes)`;
  }
  return null;
}

export async function inspectPdfFile(filePath: string, minBytes: number): Promise<PdfFileState> {
  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(filePath, "r");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return "missing";
    }
    throw error;
  }

  try {
    const stat = await handle.stat();
    const header = Buffer.alloc(PDF_SIGNATURE.length);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    if (bytesRead < PDF_SIGNATURE.length || header.toString("latin1") !== PDF_SIGNATURE) {
      return "invalid";
    }
    return stat.size >= minBytes ? "valid" : "invalid";
  } finally {
    await handle.close();
  }
}
