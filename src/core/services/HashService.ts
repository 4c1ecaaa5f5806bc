export interface HashService {
  computeFileHash(filePath: string): Promise<string>;
}
