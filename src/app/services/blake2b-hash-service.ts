import { blake2b } from '@noble/hashes/blake2b';
import { injectable } from 'inversify';
import "reflect-metadata";

@injectable()
export class Blake2bHashService {

  hash256(input: Uint8Array): Uint8Array {
    return blake2b(input, { dkLen: 32 });
  }

  // first 192 bits of hash256, used as pay-to-script-hash content
  hash192(input: Uint8Array): Uint8Array {
    return this.hash256(input).slice(0, 24);
  }

}
