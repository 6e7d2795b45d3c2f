import { TonClient, TonClient4 } from "@ton/ton";
import type { ConfigService } from "../base/config.service";
import { TonV4Provider } from "./tonapi-v4.provider";
import { ToncenterProvider } from "./toncenter.provider";
import type { IProvider, TProviderConfig } from "./types";

const DEFAULT_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 1000;

export function providerConfigFromEnv(configService: ConfigService): TProviderConfig {
  const retry = {
    retries: configService.getNumber("TON_PROVIDER_RETRIES", DEFAULT_RETRIES),
    retryDelayMs: configService.getNumber(
      "TON_PROVIDER_RETRY_DELAY_MS",
      DEFAULT_RETRY_DELAY_MS,
    ),
  };
  const kind = configService.get("TON_PROVIDER") ?? "toncenter";
  switch (kind) {
    case "toncenter":
      return {
        kind: "toncenter",
        endpoint: configService.getOrThrow("TON_CENTER_V2_ENDPOINT") + "/jsonRPC",
        apiKey: configService.get("TON_CENTER_API_KEY"),
        ...retry,
      };
    case "tonapi-v4":
      return {
        kind: "tonapi-v4",
        endpoint: configService.getOrThrow("TON_V4_ENDPOINT"),
        ...retry,
      };
    default:
      throw new Error(`Unknown TON_PROVIDER "${kind}", expected toncenter or tonapi-v4`);
  }
}

export function createProvider(config: TProviderConfig): IProvider {
  const retry = { retries: config.retries, retryDelayMs: config.retryDelayMs };
  switch (config.kind) {
    case "toncenter":
      return new ToncenterProvider(
        new TonClient({ endpoint: config.endpoint, apiKey: config.apiKey }),
        retry,
      );
    case "tonapi-v4":
      return new TonV4Provider(new TonClient4({ endpoint: config.endpoint }), retry);
  }
}
