import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import "reflect-metadata";
import { AddressController } from './app/controllers/address-controller';
import { createContainer } from "./app/inversify.config";
import { loadConfig } from './app/misc/config';
import addressRoutes from './app/routes/address';
import { AddressEncodingService } from './app/services/address-encoding-service';

const config = loadConfig();
const container = createContainer(config);

let addressController = container.get(AddressController);
let addressEncodingService = container.get(AddressEncodingService);
let listenPort = container.getNamed<number>("number", "listen_port");

const app = express();
app.use(cors());
app.use(express.json());
app.use('/addresses', addressRoutes(addressController));
app.use(function (err: Error, req: Request, res: Response, next: NextFunction) {
  // body-parser marks malformed JSON with a 4xx status
  if ('status' in err && typeof err.status === 'number' && err.status < 500) {
    res.sendStatus(err.status);
    return;
  }
  console.error(err.stack);
  res.sendStatus(500);
});
app.listen(listenPort, () => {
  console.log("address codec listening on port", listenPort, "network", addressEncodingService.network, "prefix", addressEncodingService.networkPrefix);
});
