import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { MAINNET_NETWORK_PREFIX, type NetworkPrefix, TESTNET_NETWORK_PREFIX } from '../models/network-prefix';

const configSchema = z.object({
  network: z.union([
    z.literal("mainnet"),
    z.literal("testnet"),
    z.number().int().min(0).max(255)
  ]),
  listen_port: z.number().int().min(0).max(65535)
});

export type Config = z.infer<typeof configSchema>;

export function networkPrefixOf(config: Config): NetworkPrefix {
  if (config.network === "mainnet") return MAINNET_NETWORK_PREFIX;
  if (config.network === "testnet") return TESTNET_NETWORK_PREFIX;
  return config.network;
}

export function parseConfig(raw: unknown): Config {
  let result = configSchema.safeParse(raw);
  if (!result.success) {
    let issues = result.error.issues.map(issue => issue.path.join(".")+": "+issue.message);
    throw new Error("Invalid config: "+issues.join("; "));
  }
  return result.data;
}

export function loadConfig(cwd: string = process.cwd()): Config {
  let file = path.join(cwd, 'config.json');
  let raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return parseConfig(raw);
}
