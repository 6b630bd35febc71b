import { inject, injectable, named } from "inversify";
import "reflect-metadata";
import {
  Address,
  AddressTypeTag,
  isAddressTypeTag,
  pubKeyAddress,
  ScriptHashAddress,
  scriptAddress,
  scriptHashAddress
} from '../models/address';
import {
  AddressDecodingError,
  AddressResult,
  checksumMismatch,
  malformedEncoding,
  networkMismatch,
  tooShort,
  unsupportedAddressType
} from '../models/address-error';
import {
  isMainnetAddress,
  isTestnetAddress,
  MAINNET_NETWORK_PREFIX,
  NetworkName,
  networkName,
  NetworkPrefix,
  TESTNET_NETWORK_PREFIX,
  toNetworkPrefix,
  usesTestnetRange
} from '../models/network-prefix';
import { Base58Service } from './base58-service';
import { Blake2bHashService } from './blake2b-hash-service';

/** Length of the checksum section of encoded address bytes. */
export const CHECKSUM_LENGTH = 4;

/**
 * Network-aware encoder for Address <-> base58 string conversions.
 *
 * Encoded bytes: prefix byte ++ content bytes ++ checksum, where
 * prefix byte = (network prefix + address type) mod 256 and
 * checksum = first 4 bytes of blake2b256(prefix byte ++ content bytes).
 */
@injectable()
export class AddressEncodingService {

  readonly networkPrefix: NetworkPrefix;

  constructor(
    @inject("number") @named("networkprefix") networkPrefix: number,
    @inject(Blake2bHashService) private hashService: Blake2bHashService,
    @inject(Base58Service) private base58: Base58Service) {
    this.networkPrefix = toNetworkPrefix(networkPrefix);
  }

  static mainnet(): AddressEncodingService {
    return new AddressEncodingService(MAINNET_NETWORK_PREFIX, new Blake2bHashService(), new Base58Service());
  }

  static testnet(): AddressEncodingService {
    return new AddressEncodingService(TESTNET_NETWORK_PREFIX, new Blake2bHashService(), new Base58Service());
  }

  get network(): NetworkName {
    return networkName(this.networkPrefix);
  }

  encode(address: Address): string {
    let contentBytes = address.contentBytes;
    let withNetworkByte = new Uint8Array(1 + contentBytes.length);
    withNetworkByte[0] = (this.networkPrefix + address.type) & 0xff;
    withNetworkByte.set(contentBytes, 1);

    let checksum = this.hashService.hash256(withNetworkByte).slice(0, CHECKSUM_LENGTH);
    let bytes = new Uint8Array(withNetworkByte.length + CHECKSUM_LENGTH);
    bytes.set(withNetworkByte, 0);
    bytes.set(checksum, withNetworkByte.length);
    return this.base58.encode(bytes);
  }

  isTestnetAddress(addrHeadByte: number): boolean {
    return isTestnetAddress(addrHeadByte);
  }

  isMainnetAddress(addrHeadByte: number): boolean {
    return isMainnetAddress(addrHeadByte);
  }

  decode(addrBase58Str: string): AddressResult {
    let bytes = this.base58.decode(addrBase58Str);
    if (bytes === undefined) return { ok: false, error: malformedEncoding() };
    if (bytes.length < 1 + CHECKSUM_LENGTH) return { ok: false, error: tooShort(bytes.length) };

    let headByte = bytes[0];
    if (usesTestnetRange(this.networkPrefix)) {
      if (!isTestnetAddress(headByte)) {
        return { ok: false, error: networkMismatch(headByte, "mainnet address decoded on testnet") };
      }
    } else if (!isMainnetAddress(headByte)) {
      return { ok: false, error: networkMismatch(headByte, "testnet address decoded on mainnet") };
    }

    let addressType = (headByte - this.networkPrefix) & 0xff;
    if (!isAddressTypeTag(addressType)) return { ok: false, error: unsupportedAddressType(addressType) };

    let withoutChecksum = bytes.subarray(0, bytes.length - CHECKSUM_LENGTH);
    let checksum = bytes.subarray(bytes.length - CHECKSUM_LENGTH);

    let expected = this.hashService.hash256(withoutChecksum);
    for (let i = 0; i < CHECKSUM_LENGTH; i++) {
      if (expected[i] !== checksum[i]) return { ok: false, error: checksumMismatch() };
    }

    let contentBytes = withoutChecksum.subarray(1);

    switch (addressType) {
      case AddressTypeTag.PubKey:
        return { ok: true, address: pubKeyAddress(contentBytes) };
      case AddressTypeTag.ScriptHash:
        return scriptHashAddress(contentBytes);
      case AddressTypeTag.Script:
        return { ok: true, address: scriptAddress(contentBytes) };
      default: {
        let unreachable: never = addressType;
        return { ok: false, error: unsupportedAddressType(unreachable) };
      }
    }
  }

  decodeOrThrow(addrBase58Str: string): Address {
    let result = this.decode(addrBase58Str);
    if (!result.ok) throw new AddressDecodingError(result.error, addrBase58Str);
    return result.address;
  }

  isValid(addrBase58Str: string): boolean {
    return this.decode(addrBase58Str).ok;
  }

  isP2PKAddress(addrBase58Str: string): boolean {
    let result = this.decode(addrBase58Str);
    return result.ok && result.address.type === AddressTypeTag.PubKey;
  }

  scriptHashAddressFromScript(scriptBytes: Uint8Array): ScriptHashAddress {
    let result = scriptHashAddress(this.hashService.hash192(scriptBytes));
    // hash192 always yields SCRIPT_HASH_LENGTH bytes
    if (!result.ok) throw new AddressDecodingError(result.error);
    return result.address;
  }

}
