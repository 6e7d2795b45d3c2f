export interface KeystoreStrategyInterface {
  store(name: string, secretKey: Buffer): boolean;
  load(name: string): Buffer | undefined;
  remove(name: string): boolean;
  list(): string[];
  cleanup(): void;
}
