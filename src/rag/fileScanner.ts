/**
 * Utility for scanning and finding supported files in a directory.
 */
import fs from 'fs';
import path from 'path';

export interface ScanOptions {
  extensions: readonly string[];
  recursive?: boolean;
  excludeHidden?: boolean;
}

/**
 * Scans a directory for document files with allowed extensions.
 */
export class FileScanner {
  /**
   * Get all files under `directory` whose extension is allowed.
   * Returns an empty list when the directory does not exist.
   */
  static scan(directory: string, options: ScanOptions): string[] {
    if (!this.isDirectory(directory)) {
      return [];
    }

    const allowed = new Set(options.extensions.map((ext) => ext.toLowerCase()));
    return this.scanDirectory(directory, allowed, options.recursive ?? false, options.excludeHidden ?? true);
  }

  static isDirectory(directory: string): boolean {
    try {
      return fs.statSync(directory).isDirectory();
    } catch {
      return false;
    }
  }

  private static scanDirectory(
    dir: string,
    allowed: Set<string>,
    recursive: boolean,
    excludeHidden: boolean
  ): string[] {
    const files: string[] = [];
    const entries = fs.readdirSync(dir, { withFileTypes: true });

    for (const entry of entries) {
      if (excludeHidden && entry.name.startsWith('.')) {
        continue;
      }

      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (recursive) {
          files.push(...this.scanDirectory(fullPath, allowed, recursive, excludeHidden));
        }
      } else if (entry.isFile() && allowed.has(this.extensionOf(fullPath))) {
        files.push(fullPath);
      }
    }

    return files;
  }

  static extensionOf(filePath: string): string {
    return path.extname(filePath).toLowerCase();
  }
}
