import { type KeyPair, keyPairFromSecretKey } from "@ton/crypto";
import type { ConfigService } from "../base/config.service";
import type { KeystoreStrategyInterface } from "./strategies/keystore-strategy.interface";
import { StrategyEnum } from "./strategies/strategy.enum";
import { StrategyFabric } from "./strategies/strategy.fabric";

export class KeystoreService {
  strategy: KeystoreStrategyInterface;

  constructor(strategy: StrategyEnum, dirname: string) {
    const fabric = new StrategyFabric(dirname);
    this.strategy = fabric.getStrategy(strategy);
  }

  store(name: string, secretKey: Buffer): boolean {
    return this.strategy.store(name, secretKey);
  }

  load(name: string): Buffer | undefined {
    return this.strategy.load(name);
  }

  /** Key pair rebuilt from a stored 64-byte Ed25519 secret key. */
  loadKeyPair(name: string): KeyPair | undefined {
    const secretKey = this.strategy.load(name);
    return secretKey ? keyPairFromSecretKey(secretKey) : undefined;
  }

  remove(name: string): boolean {
    return this.strategy.remove(name);
  }

  list(): string[] {
    return this.strategy.list();
  }

  cleanup() {
    this.strategy.cleanup();
  }
}

/** File keystore rooted at `KEYSTORE_DIR`. */
export function keystoreFromEnv(configService: ConfigService): KeystoreService {
  return new KeystoreService(
    StrategyEnum.FILE,
    configService.getOrThrow("KEYSTORE_DIR"),
  );
}
