import fs from "fs";
import path from "path";
import { IOError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export interface ExportFile {
  /** Path relative to the export directory. */
  name: string;
  contents: string | Buffer;
}

/**
 * Create the export directory if needed and write every file. Any failure
 * aborts the whole export: OSCAR expects a consistent file set.
 */
export function writeExport(exportPath: string, files: ExportFile[], logger: Logger): string[] {
  const root = path.resolve(exportPath);
  const names = new Set<string>();
  for (const file of files) {
    if (names.has(file.name)) {
      throw new IOError(`Refusing to export ${file.name} twice in ${root}`);
    }
    names.add(file.name);
  }

  try {
    fs.mkdirSync(root, { recursive: true });
  } catch (err) {
    throw new IOError(`Could not create export directory ${root}: ${errorMessage(err)}`, { cause: err });
  }

  const written: string[] = [];
  for (const file of files) {
    const outPath = path.join(root, file.name);
    try {
      fs.writeFileSync(outPath, file.contents);
    } catch (err) {
      throw new IOError(`Could not write ${outPath}: ${errorMessage(err)}`, { cause: err });
    }
    written.push(outPath);
    logger.info({ file: outPath, bytes: Buffer.byteLength(file.contents) }, `Exported ${file.name}`);
  }

  return written;
}
