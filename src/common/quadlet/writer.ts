import fs from 'fs-extra';

export const UNIT_FILE_MODE = 0o644;
export const OUTPUT_DIR_MODE = 0o755;

export interface UnitFileWriter {
  ensureDir(dir: string): void;
  writeFile(file_path: string, contents: string): void;
}

export class FsUnitFileWriter implements UnitFileWriter {
  ensureDir(dir: string): void {
    fs.ensureDirSync(dir, OUTPUT_DIR_MODE);
  }

  writeFile(file_path: string, contents: string): void {
    fs.writeFileSync(file_path, contents, { mode: UNIT_FILE_MODE });
  }
}
