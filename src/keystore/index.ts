export { KeystoreService, keystoreFromEnv } from "./keystore.service";
export { StrategyEnum } from "./strategies/strategy.enum";
