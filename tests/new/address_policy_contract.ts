import assert from 'node:assert/strict';
import { addressFamily, isPermittedAddress } from '../../server/control/address_policy.js';

function testPermittedAddresses(): void {
  const permitted = [
    '127.0.0.1',
    '127.255.0.9',
    '10.1.2.3',
    '172.16.0.1',
    '172.31.255.255',
    '192.168.1.1',
    '169.254.10.10',
    '100.64.0.1',
    '198.18.0.5',
    '240.0.0.1',
    '::1',
    'fd00::1',
    'fe80::1',
    '::ffff:127.0.0.1',
    '::ffff:192.168.0.1',
  ];
  for (const address of permitted) {
    assert.equal(isPermittedAddress(address), true, `${address} should be permitted`);
  }
}

function testRejectedAddresses(): void {
  const rejected = [
    '8.8.8.8',
    '1.1.1.1',
    '172.32.0.1',
    '192.169.0.1',
    '0.0.0.0',
    '255.255.255.255',
    '224.0.0.1',
    '2001:4860:4860::8888',
    '::ffff:8.8.8.8',
    'localhost',
    'not-an-ip',
    '',
  ];
  for (const address of rejected) {
    assert.equal(isPermittedAddress(address), false, `${address} should be rejected`);
  }
}

function testAddressFamily(): void {
  assert.equal(addressFamily('10.0.0.1'), 'ipv4');
  assert.equal(addressFamily('::1'), 'ipv6');
  assert.equal(addressFamily('example.internal'), null);
}

function main(): void {
  testPermittedAddresses();
  testRejectedAddresses();
  testAddressFamily();
  console.log('[address_policy_contract] PASS');
}

main();
