import { type AddressResult, invalidContentLength } from "./address-error";

/** Value added to the network prefix in the first byte of an encoded address. */
export enum AddressTypeTag {
  PubKey = 1,
  ScriptHash = 2,
  Script = 3
}

//192-bits hash used
export const SCRIPT_HASH_LENGTH = 24;

export interface PubKeyAddress {
  readonly type: AddressTypeTag.PubKey;
  /** Serialized (compressed) public key. */
  readonly contentBytes: Uint8Array;
}

export interface ScriptHashAddress {
  readonly type: AddressTypeTag.ScriptHash;
  /** First 192 bits of the Blake2b256 hash of the serialized script. */
  readonly contentBytes: Uint8Array;
}

export interface ScriptAddress {
  readonly type: AddressTypeTag.Script;
  /** Serialized script. */
  readonly contentBytes: Uint8Array;
}

/**
 * Pay-to-public-key, pay-to-script-hash or pay-to-script address.
 *
 * Content bytes never include the prefix byte or the checksum; those belong to
 * the encoded form and are managed by the AddressEncodingService.
 */
export type Address = PubKeyAddress | ScriptHashAddress | ScriptAddress;

export type AddressTypeName = "P2PK" | "P2SH" | "P2S";

export function pubKeyAddress(pubkeyBytes: Uint8Array): PubKeyAddress {
  return Object.freeze({ type: AddressTypeTag.PubKey, contentBytes: Uint8Array.from(pubkeyBytes) });
}

export function scriptHashAddress(scriptHash: Uint8Array): AddressResult<ScriptHashAddress> {
  if (scriptHash.length !== SCRIPT_HASH_LENGTH) {
    return { ok: false, error: invalidContentLength(SCRIPT_HASH_LENGTH, scriptHash.length) };
  }
  let address: ScriptHashAddress = Object.freeze({
    type: AddressTypeTag.ScriptHash,
    contentBytes: Uint8Array.from(scriptHash)
  });
  return { ok: true, address: address };
}

export function scriptAddress(scriptBytes: Uint8Array): ScriptAddress {
  return Object.freeze({ type: AddressTypeTag.Script, contentBytes: Uint8Array.from(scriptBytes) });
}

export function isAddressTypeTag(value: number): value is AddressTypeTag {
  return value === AddressTypeTag.PubKey || value === AddressTypeTag.ScriptHash || value === AddressTypeTag.Script;
}

export function addressTypeName(type: AddressTypeTag): AddressTypeName {
  switch (type) {
    case AddressTypeTag.PubKey:
      return "P2PK";
    case AddressTypeTag.ScriptHash:
      return "P2SH";
    case AddressTypeTag.Script:
      return "P2S";
  }
}

/** Builds an address of the named type; only P2SH content can be rejected. */
export function addressFromContent(name: AddressTypeName, contentBytes: Uint8Array): AddressResult {
  switch (name) {
    case "P2PK":
      return { ok: true, address: pubKeyAddress(contentBytes) };
    case "P2SH":
      return scriptHashAddress(contentBytes);
    case "P2S":
      return { ok: true, address: scriptAddress(contentBytes) };
  }
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function addressEquals(a: Address, b: Address): boolean {
  return a.type === b.type && bytesEqual(a.contentBytes, b.contentBytes);
}
