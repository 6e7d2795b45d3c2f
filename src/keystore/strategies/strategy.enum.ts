export enum StrategyEnum {
  FILE = "file",
}
