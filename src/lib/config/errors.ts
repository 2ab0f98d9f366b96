export class UnderwritingConfigError extends Error {
  constructor(
    public readonly file: string,
    message: string,
  ) {
    super(`[underwritingConfig] ${file}: ${message}`);
    this.name = "UnderwritingConfigError";
  }
}
