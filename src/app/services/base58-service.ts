import bs58 from 'bs58';
import { injectable } from 'inversify';
import "reflect-metadata";

@injectable()
export class Base58Service {

  encode(bytes: Uint8Array): string {
    return bs58.encode(bytes);
  }

  /** Returns undefined for an empty string or characters outside the base58 alphabet. */
  decode(str: string): Uint8Array | undefined {
    if (str.length === 0) return undefined;
    return bs58.decodeUnsafe(str);
  }

}
