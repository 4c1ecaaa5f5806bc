import { InvalidArgumentError } from 'commander';
import { ChannelName, isChannelName } from '../core/entities/UpdateChannel';

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new InvalidArgumentError('Not a valid port.');
  }
  return port;
}

export function parseChannel(value: string): ChannelName {
  if (!isChannelName(value)) {
    throw new InvalidArgumentError('Expected "default" or "stable".');
  }
  return value;
}
