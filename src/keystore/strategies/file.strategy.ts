import * as fs from "fs";
import * as path from "path";
import { Logger } from "../../base/logger.service";
import type { KeystoreStrategyInterface } from "./keystore-strategy.interface";

const NAME_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;

/** Secret keys as hex files under `<dirname>/keystores/storage`. */
export class FileStrategy implements KeystoreStrategyInterface {
  protected logger = new Logger(FileStrategy.name);

  private storageDir: string;

  private storageCache: Map<string, Buffer> = new Map();

  constructor(dirname: string) {
    this.storageDir = path.resolve(dirname, "keystores", "storage");
    this.logger.debug("SET storageDir:", this.storageDir);

    if (!fs.existsSync(this.storageDir)) {
      fs.mkdirSync(this.storageDir, { recursive: true, mode: 0o700 });
    }
  }

  private _filepath(name: string): string {
    if (!NAME_PATTERN.test(name) || name.startsWith(".")) {
      throw new Error(`Invalid key name: ${name}`);
    }
    return path.join(this.storageDir, name);
  }

  store(name: string, secretKey: Buffer): boolean {
    try {
      const filepath = this._filepath(name);

      if (fs.existsSync(filepath)) {
        const stats = fs.statSync(filepath);
        if (stats.isDirectory()) {
          throw new Error(`Filepath is a directory: ${filepath}`);
        }
      }

      fs.writeFileSync(filepath, secretKey.toString("hex"), {
        flag: "w+",
        mode: 0o600,
      });
      this.storageCache.set(name, Buffer.from(secretKey));

      return true;
    } catch (error) {
      this.logger.error(error);
      return false;
    }
  }

  load(name: string): Buffer | undefined {
    const cached = this.storageCache.get(name);
    if (cached) {
      return Buffer.from(cached);
    }

    const filepath = this._filepath(name);
    if (!fs.existsSync(filepath)) {
      return undefined;
    }
    const secretKey = Buffer.from(fs.readFileSync(filepath, "utf-8").trim(), "hex");
    this.storageCache.set(name, secretKey);
    return Buffer.from(secretKey);
  }

  remove(name: string): boolean {
    try {
      const filepath = this._filepath(name);
      this.storageCache.delete(name);
      if (!fs.existsSync(filepath)) {
        return false;
      }
      fs.unlinkSync(filepath);
      return true;
    } catch (error) {
      this.logger.error(error);
      return false;
    }
  }

  list(): string[] {
    return fs
      .readdirSync(this.storageDir)
      .filter((name) => NAME_PATTERN.test(name))
      .sort();
  }

  cleanup(): void {
    this.storageCache.clear();
  }
}
