import { cellFromBoc } from "../src/boc";
import type { IProvider, TAccountState } from "../src/providers/types";
import { type TTransferResult, WalletService } from "../src/wallet/wallet.service";
import { WalletVariant, createWalletState } from "../src/wallets";
import { golden, testAddress, testKeyPair } from "./utils";

const NOW = golden.scenarioA.now;

class StubProvider implements IProvider {
  sent: Buffer[] = [];

  constructor(private readonly account: TAccountState) {}

  async getAccountState(): Promise<TAccountState> {
    return this.account;
  }

  async sendBoc(boc: Buffer) {
    this.sent.push(boc);
    return { hash: cellFromBoc(boc).hash().toString("hex") };
  }
}

describe("WalletService", () => {
  const keyPair = testKeyPair();
  let provider: StubProvider;
  let service: WalletService;

  beforeEach(() => {
    provider = new StubProvider({ balance: 0n, deployed: false, status: "uninit" });
    service = new WalletService(provider, undefined, () => NOW);
  });

  it("opens an undeployed wallet at its derived address", async () => {
    const state = await service.open(WalletVariant.V4R2, keyPair.publicKey);
    const expected = createWalletState(WalletVariant.V4R2, { publicKey: keyPair.publicKey });

    expect(state.address.equals(expected.address)).toBe(true);
    expect(state.address.toRawString()).toBe(golden.scenarioA.walletAddress);
    expect(state.deployed).toBe(false);
    expect(state.seqno).toBe(0);
  });

  it("derives highload addresses with the requested timeout", async () => {
    const state = await service.open(WalletVariant.HighloadV3, keyPair.publicKey, {
      timeout: 600,
    });
    const expected = createWalletState(WalletVariant.HighloadV3, {
      publicKey: keyPair.publicKey,
      timeout: 600,
    });
    expect(state.address.equals(expected.address)).toBe(true);
    expect(state.timeout).toBe(600);
    expect(state.queryWindow).toBeDefined();
  });

  it("submits the assembled transaction", async () => {
    const state = await service.open(WalletVariant.V4R2, keyPair.publicKey);
    const result = await service.transfer(state, keyPair, [
      { to: testAddress(1), value: 1000n },
    ]);

    expect(provider.sent).toEqual([result.transaction.boc]);
    expect(result.hash).toBe(result.transaction.hash.toString("hex"));
    expect(result.transaction.validUntil).toBe(NOW + 60);
  });

  it("keeps pending query ids when a highload wallet is reopened", async () => {
    const queryIdOf = ({ transaction }: TTransferResult) =>
      transaction.sequence.kind === "query-id" ? transaction.sequence.queryId.queryId : -1;
    const payment = [{ to: testAddress(1), value: 1000n }];

    const first = await service.transfer(
      await service.open(WalletVariant.HighloadV3, keyPair.publicKey),
      keyPair,
      payment,
    );
    const reopened = await service.open(WalletVariant.HighloadV3, keyPair.publicKey);
    const second = await service.transfer(reopened, keyPair, payment);

    expect(queryIdOf(first)).toBe(0);
    expect(queryIdOf(second)).toBe(1);
    expect(reopened.queryWindow?.size).toBe(2);
  });

  it("tracks query ids per wallet", async () => {
    const payment = [{ to: testAddress(1), value: 1000n }];
    await service.transfer(
      await service.open(WalletVariant.HighloadV3, keyPair.publicKey),
      keyPair,
      payment,
    );
    const other = await service.open(WalletVariant.HighloadV3, keyPair.publicKey, {
      subwalletId: 1,
    });
    expect(other.queryWindow?.size).toBe(0);
  });
});
