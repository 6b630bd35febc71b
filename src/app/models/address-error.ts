import type { Address } from "./address";

export type AddressError =
  | { kind: "MalformedEncoding"; message: string }
  | { kind: "TooShort"; length: number; message: string }
  | { kind: "NetworkMismatch"; headByte: number; message: string }
  | { kind: "UnsupportedAddressType"; addressType: number; message: string }
  | { kind: "ChecksumMismatch"; message: string }
  | { kind: "InvalidContentLength"; expected: number; actual: number; message: string };

export type AddressErrorKind = AddressError["kind"];

export type AddressResult<T extends Address = Address> =
  | { ok: true; address: T }
  | { ok: false; error: AddressError };

export function malformedEncoding(): AddressError {
  return { kind: "MalformedEncoding", message: "Not a valid base58 string" };
}

export function tooShort(length: number): AddressError {
  return { kind: "TooShort", length, message: "Address is too short ("+length+" bytes)" };
}

export function networkMismatch(headByte: number, message: string): AddressError {
  return { kind: "NetworkMismatch", headByte, message };
}

export function unsupportedAddressType(addressType: number): AddressError {
  return { kind: "UnsupportedAddressType", addressType, message: "Unsupported address type: "+addressType };
}

export function checksumMismatch(): AddressError {
  return { kind: "ChecksumMismatch", message: "Checksum check fails" };
}

export function invalidContentLength(expected: number, actual: number): AddressError {
  return {
    kind: "InvalidContentLength",
    expected,
    actual,
    message: "Improper content length ("+actual+" bytes, expected "+expected+")"
  };
}

/** Thrown by the throwing variants of the codec. */
export class AddressDecodingError extends Error {

  readonly kind: AddressErrorKind;

  constructor(readonly error: AddressError, input?: string) {
    super(input === undefined ? error.message : error.message+" for "+input);
    this.name = "AddressDecodingError";
    this.kind = error.kind;
  }

}
