import { networkInterfaces } from 'node:os';
import type { NetworkInterfaceInfo } from 'node:os';

type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

/** First external IPv4 address, for printing URLs other machines on the LAN can open. */
export function getLocalIp(interfaces: InterfaceTable = networkInterfaces()): string {
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family === 'IPv4' && !entry.internal) {
        return entry.address;
      }
    }
  }
  return '127.0.0.1';
}

/** Address to show in URLs: the wildcard binds are replaced by the LAN address. */
export function displayHost(bindHost: string, interfaces?: InterfaceTable): string {
  if (bindHost === '0.0.0.0' || bindHost === '::') {
    return getLocalIp(interfaces);
  }
  return bindHost;
}
