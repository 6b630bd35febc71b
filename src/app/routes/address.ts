import { Router } from 'express';
import type { AddressController } from '../controllers/address-controller';
import { expressWrapAsync } from '../misc/utils';

export default function(addressController: AddressController): Router {
  const router = Router();
  router.post("/", expressWrapAsync(addressController.postAddress));
  router.post("/script_hash", expressWrapAsync(addressController.postScriptHash));
  router.get("/:address", expressWrapAsync(addressController.getAddress));
  router.get("/:address/is_p2pk", expressWrapAsync(addressController.getIsP2PK));
  return router;
}
