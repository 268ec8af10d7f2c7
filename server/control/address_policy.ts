import { BlockList, isIP } from 'node:net';

export type AddressFamily = 'ipv4' | 'ipv6';

export interface PermittedRange {
  network: string;
  prefix: number;
  family: AddressFamily;
  label: string;
}

export const PERMITTED_RANGES: readonly PermittedRange[] = [
  { network: '10.0.0.0', prefix: 8, family: 'ipv4', label: 'private' },
  { network: '100.64.0.0', prefix: 10, family: 'ipv4', label: 'shared address space' },
  { network: '127.0.0.0', prefix: 8, family: 'ipv4', label: 'loopback' },
  { network: '169.254.0.0', prefix: 16, family: 'ipv4', label: 'link-local' },
  { network: '172.16.0.0', prefix: 12, family: 'ipv4', label: 'private' },
  { network: '192.0.0.0', prefix: 24, family: 'ipv4', label: 'protocol assignments' },
  { network: '192.0.2.0', prefix: 24, family: 'ipv4', label: 'documentation' },
  { network: '192.168.0.0', prefix: 16, family: 'ipv4', label: 'private' },
  { network: '198.18.0.0', prefix: 15, family: 'ipv4', label: 'benchmarking' },
  { network: '198.51.100.0', prefix: 24, family: 'ipv4', label: 'documentation' },
  { network: '203.0.113.0', prefix: 24, family: 'ipv4', label: 'documentation' },
  { network: '240.0.0.0', prefix: 4, family: 'ipv4', label: 'reserved' },
  { network: '::1', prefix: 128, family: 'ipv6', label: 'loopback' },
  { network: '100::', prefix: 64, family: 'ipv6', label: 'discard-only' },
  { network: '2001:db8::', prefix: 32, family: 'ipv6', label: 'documentation' },
  { network: 'fc00::', prefix: 7, family: 'ipv6', label: 'unique local' },
  { network: 'fe80::', prefix: 10, family: 'ipv6', label: 'link-local' },
];

const LIMITED_BROADCAST = '255.255.255.255';
const MAPPED_IPV4 = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

const permitted = new BlockList();
for (const range of PERMITTED_RANGES) {
  permitted.addSubnet(range.network, range.prefix, range.family);
}

export function addressFamily(address: string): AddressFamily | null {
  const version = isIP(address);
  if (version === 4) return 'ipv4';
  if (version === 6) return 'ipv6';
  return null;
}

/**
 * True when `address` is a literal IP inside one of the permitted ranges.
 * IPv4-mapped IPv6 addresses are judged by the IPv4 address they carry.
 */
export function isPermittedAddress(address: string): boolean {
  const trimmed = address.trim();
  const mapped = MAPPED_IPV4.exec(trimmed);
  const candidate = mapped ? mapped[1] : trimmed;

  const family = addressFamily(candidate);
  if (!family) return false;
  if (candidate === LIMITED_BROADCAST) return false;

  return permitted.check(candidate, family);
}
