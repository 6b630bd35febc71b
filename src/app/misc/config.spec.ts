import { expect } from 'chai';
import fs from 'fs';
import 'mocha';
import os from 'os';
import path from 'path';
import { loadConfig, networkPrefixOf, parseConfig } from './config';
import { hexToBytes, isHex } from './utils';

describe('config', () => {

  it('maps network names and custom prefixes', () => {
    expect(networkPrefixOf(parseConfig({ network: "mainnet", listen_port: 3006 }))).to.equal(0);
    expect(networkPrefixOf(parseConfig({ network: "testnet", listen_port: 3006 }))).to.equal(16);
    expect(networkPrefixOf(parseConfig({ network: 32, listen_port: 3006 }))).to.equal(32);
  });

  it('rejects invalid settings', () => {
    expect(() => parseConfig({ network: "devnet", listen_port: 3006 })).to.throw(/^Invalid config: network: /);
    expect(() => parseConfig({ network: 300, listen_port: 3006 })).to.throw(/^Invalid config: network: /);
    expect(() => parseConfig({ network: "mainnet" })).to.throw(/^Invalid config: listen_port: /);
  });

  it('reads config.json from the given directory', () => {
    let dir = fs.mkdtempSync(path.join(os.tmpdir(), 'address-codec-'));
    try {
      fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ network: "testnet", listen_port: 8080 }));
      expect(loadConfig(dir)).to.deep.equal({ network: "testnet", listen_port: 8080 });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

});

describe('hex utils', () => {

  it('validates and decodes hex', () => {
    expect(isHex("0aFF")).to.equal(true);
    expect(isHex("abc")).to.equal(false);
    expect(isHex("zz")).to.equal(false);
    expect(Array.from(hexToBytes("0aff"))).to.deep.equal([10, 255]);
    expect(() => hexToBytes("0g")).to.throw("Invalid hex string");
  });

});
