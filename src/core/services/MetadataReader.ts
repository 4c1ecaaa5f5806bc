import { readFile } from 'fs/promises';
import { MetadataRecord } from '../entities/MetadataRecord';
import { MetadataError } from '../errors';

export interface MetadataReader {
  read(filePath: string): Promise<MetadataRecord>;
}

export type IniSections = Map<string, Map<string, string>>;

const APP_SECTION = 'App';

/**
 * Reads the `[App]` section of an `application_<stamp>.ini` file.
 * Keys are matched case-insensitively, section names are not.
 */
export class IniMetadataReader implements MetadataReader {
  async read(filePath: string): Promise<MetadataRecord> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new MetadataError(`Cannot read metadata file ${filePath}`, { cause: error });
    }

    const sections = this.parse(content, filePath);
    const app = sections.get(APP_SECTION);
    if (!app) {
      throw new MetadataError(`No [${APP_SECTION}] section in ${filePath}`);
    }
    return new MetadataRecord(
      this.required(app, 'BuildID', filePath),
      this.required(app, 'Version', filePath)
    );
  }

  parse(content: string, filePath = '<memory>'): IniSections {
    const sections: IniSections = new Map();
    let current: Map<string, string> | undefined;

    content.split(/\r?\n/).forEach((raw, index) => {
      const line = raw.trim();
      if (!line || line.startsWith('#') || line.startsWith(';')) return;

      const header = line.match(/^\[([^\]]+)\]$/);
      if (header) {
        const name = header[1].trim();
        current = sections.get(name) ?? new Map<string, string>();
        sections.set(name, current);
        return;
      }

      const separator = line.search(/[=:]/);
      if (separator <= 0) {
        throw new MetadataError(`Malformed line ${index + 1} in ${filePath}`, { details: { line: raw } });
      }
      if (!current) {
        throw new MetadataError(`Key outside of any section at line ${index + 1} in ${filePath}`);
      }
      const key = line.slice(0, separator).trim().toLowerCase();
      current.set(key, line.slice(separator + 1).trim());
    });

    return sections;
  }

  private required(section: Map<string, string>, key: string, filePath: string): string {
    const value = section.get(key.toLowerCase());
    if (!value) {
      throw new MetadataError(`Missing ${APP_SECTION}.${key} in ${filePath}`);
    }
    return value;
  }
}
