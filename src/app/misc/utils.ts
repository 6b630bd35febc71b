import type { NextFunction, Request, Response } from 'express';

export const expressWrapAsync = (fn: (req: Request, res: Response) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch((error: unknown) => next(error));
  };

export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function isHex(str: string): boolean {
  return str.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(str);
}

export function hexToBytes(hex: string): Uint8Array {
  if (!isHex(hex)) throw new Error("Invalid hex string");
  return Uint8Array.from(Buffer.from(hex, 'hex'));
}
