export class IlError extends Error {
  detail?: unknown;

  constructor(message: string, detail?: unknown) {
    super(message);
    this.name = "IlError";
    this.detail = detail;
  }
}
