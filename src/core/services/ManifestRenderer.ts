import { MetadataRecord } from '../entities/MetadataRecord';

export const DEFAULT_DOWNLOAD_BASE_URL = 'http://update.boot2gecko.org';
export const LICENSE_URL = 'http://www.mozilla.com/test/sample-eula.html';
export const DETAILS_URL = 'http://www.mozilla.com/test/sample-details.html';

/** An update whose hash and companion metadata have been loaded. */
export interface ResolvedUpdate {
  filename: string;
  size: number;
  hash: string;
  metadata: MetadataRecord;
}

export interface ManifestParams {
  /** Path segment between the download host and the filename. */
  path: string;
  dogfoodId?: string;
}

export function escapeXmlAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export class ManifestRenderer {
  constructor(private readonly downloadBaseUrl: string = DEFAULT_DOWNLOAD_BASE_URL) {}

  downloadUrl(update: Pick<ResolvedUpdate, 'filename'>, params: ManifestParams): string {
    const base = this.downloadBaseUrl.replace(/\/+$/, '');
    const query = params.dogfoodId ? `?dogfooding_prerelease_id=${params.dogfoodId}` : '';
    return `${base}/${params.path}/${update.filename}${query}`;
  }

  render(update: ResolvedUpdate, params: ManifestParams): string {
    const a = escapeXmlAttribute;
    const version = a(update.metadata.version);
    return [
      '<?xml version="1.0"?>',
      '<updates>',
      `  <update type="minor" appVersion="${version}" version="${version}" extensionVersion="${version}" buildID="${a(update.metadata.buildId)}" licenseURL="${LICENSE_URL}" detailsURL="${DETAILS_URL}">`,
      `    <patch type="complete" URL="${a(this.downloadUrl(update, params))}" hashFunction="SHA512" hashValue="${a(update.hash)}" size="${update.size}"/>`,
      '  </update>',
      '</updates>',
    ].join('\n');
  }
}
