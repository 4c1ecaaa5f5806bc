import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { HashService } from '../../core/services/HashService';

export class CryptoHashService implements HashService {
  constructor(private readonly algorithm: string = 'sha512') {}

  computeFileHash(filePath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const hash = createHash(this.algorithm);
      const stream = createReadStream(filePath);
      stream.on('data', (chunk) => hash.update(chunk));
      stream.on('end', () => resolve(hash.digest('hex')));
      stream.on('error', (error) => reject(error));
    });
  }
}
