import type { Request, Response } from 'express';
import { inject, injectable } from 'inversify';
import "reflect-metadata";
import { z } from 'zod';
import { Address, addressFromContent, AddressTypeName, addressTypeName } from '../models/address';
import type { AddressError } from '../models/address-error';
import { bytesToHex, hexToBytes } from '../misc/utils';
import { AddressEncodingService } from '../services/address-encoding-service';

export interface ControllerResult {
  status: number;
  body: object;
}

const hexString = z.string().regex(/^(?:[0-9a-fA-F]{2})*$/, "Expected an even-length hex string");

const encodeRequestSchema = z.object({
  type: z.enum(["P2PK", "P2SH", "P2S"]),
  content: hexString
});

const scriptHashRequestSchema = z.object({
  script: hexString
});

function errorBody(error: AddressError): object {
  return { error: error.kind, message: error.message };
}

function invalidRequest(error: z.ZodError): ControllerResult {
  return { status: 400, body: { error: "InvalidRequest", message: error.issues.map(issue => issue.message).join("; ") } };
}

@injectable()
export class AddressController {

  constructor(@inject(AddressEncodingService) private addressEncodingService: AddressEncodingService) {
  }

  private describeAddress(address: Address, encoded: string): object {
    return {
      address: encoded,
      type: addressTypeName(address.type),
      network: this.addressEncodingService.network,
      content: bytesToHex(address.contentBytes)
    };
  }

  decodeAddress(address: string): ControllerResult {
    let result = this.addressEncodingService.decode(address);
    if (!result.ok) return { status: 400, body: errorBody(result.error) };
    return { status: 200, body: this.describeAddress(result.address, address) };
  }

  isP2PK(address: string): ControllerResult {
    return { status: 200, body: { address: address, isP2PK: this.addressEncodingService.isP2PKAddress(address) } };
  }

  encodeAddress(body: unknown): ControllerResult {
    let parsed = encodeRequestSchema.safeParse(body);
    if (!parsed.success) return invalidRequest(parsed.error);
    let type: AddressTypeName = parsed.data.type;
    let result = addressFromContent(type, hexToBytes(parsed.data.content));
    if (!result.ok) return { status: 400, body: errorBody(result.error) };
    return { status: 200, body: { address: this.addressEncodingService.encode(result.address) } };
  }

  encodeScriptHash(body: unknown): ControllerResult {
    let parsed = scriptHashRequestSchema.safeParse(body);
    if (!parsed.success) return invalidRequest(parsed.error);
    let address = this.addressEncodingService.scriptHashAddressFromScript(hexToBytes(parsed.data.script));
    return { status: 200, body: { address: this.addressEncodingService.encode(address) } };
  }

  getAddress = async (req: Request, res: Response) => {
    send(res, this.decodeAddress(req.params.address));
  };

  getIsP2PK = async (req: Request, res: Response) => {
    send(res, this.isP2PK(req.params.address));
  };

  postAddress = async (req: Request, res: Response) => {
    send(res, this.encodeAddress(req.body));
  };

  postScriptHash = async (req: Request, res: Response) => {
    send(res, this.encodeScriptHash(req.body));
  };

}

function send(res: Response, result: ControllerResult): void {
  res.status(result.status).json(result.body);
}
