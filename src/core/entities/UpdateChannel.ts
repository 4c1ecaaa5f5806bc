export const UPDATE_SUFFIX = '.mar';

export type ChannelName = 'default' | 'stable';

export interface UpdateChannel {
  readonly name: ChannelName;
  readonly prefix: string;
}

export const CHANNELS: Record<ChannelName, UpdateChannel> = {
  default: { name: 'default', prefix: 'b2g_update_' },
  stable: { name: 'stable', prefix: 'b2g_stable_update_' },
};

export function isChannelName(value: string): value is ChannelName {
  return Object.prototype.hasOwnProperty.call(CHANNELS, value);
}

export function matchesChannel(channel: UpdateChannel, filename: string): boolean {
  return (
    filename.length > channel.prefix.length + UPDATE_SUFFIX.length &&
    filename.startsWith(channel.prefix) &&
    filename.endsWith(UPDATE_SUFFIX)
  );
}

/** Strips the channel prefix and the `.mar` suffix. */
export function versionStampOf(channel: UpdateChannel, filename: string): string {
  if (!matchesChannel(channel, filename)) {
    throw new Error(`${filename} is not a ${channel.name} channel update`);
  }
  return filename.slice(channel.prefix.length, filename.length - UPDATE_SUFFIX.length);
}

export function companionMetadataName(versionStamp: string): string {
  return `application_${versionStamp}.ini`;
}
