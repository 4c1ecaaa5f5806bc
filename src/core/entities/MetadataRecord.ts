export class MetadataRecord {
  constructor(
    public readonly buildId: string,
    public readonly version: string
  ) {
    Object.freeze(this);
  }
}
