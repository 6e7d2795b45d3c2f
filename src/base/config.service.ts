import dotenv from "dotenv";

dotenv.config();

export class ConfigService {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  get(key: string): string | undefined {
    const value = this.env[key];
    return value ? value : undefined;
  }

  getOrThrow(key: string): string {
    const value = this.get(key);
    if (value === undefined) {
      throw new Error(
        `Configuration key "${key}" is not defined in the .env file`,
      );
    }
    return value;
  }

  getNumber(key: string, fallback: number): number {
    const value = this.get(key);
    if (value === undefined) {
      return fallback;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new Error(`Configuration key "${key}" is not a number: ${value}`);
    }
    return parsed;
  }
}
