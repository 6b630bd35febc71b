import { Container } from "inversify";
import "reflect-metadata";
import { Config, networkPrefixOf } from "./misc/config";
import { AddressEncodingService } from "./services/address-encoding-service";
import { Base58Service } from "./services/base58-service";
import { Blake2bHashService } from "./services/blake2b-hash-service";

export function createContainer(config: Config): Container {
  const container = new Container({ autoBindInjectable: true, defaultScope: "Singleton" });
  container.bind<number>("number").toConstantValue(networkPrefixOf(config)).whenTargetNamed("networkprefix");
  container.bind<number>("number").toConstantValue(config.listen_port).whenTargetNamed("listen_port");
  container.bind<Blake2bHashService>(Blake2bHashService).toSelf();
  container.bind<Base58Service>(Base58Service).toSelf();
  container.bind<AddressEncodingService>(AddressEncodingService).toSelf();
  return container;
}
