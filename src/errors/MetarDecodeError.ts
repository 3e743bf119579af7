export type MetarDecodeErrorCode = 'SHORT_REPORT' | 'UNSUPPORTED_VARIANT';

export class MetarDecodeError extends Error {
  public readonly code: MetarDecodeErrorCode;

  public readonly station?: string;

  constructor(code: MetarDecodeErrorCode, message: string, station?: string) {
    super(message);
    this.name = 'MetarDecodeError';
    this.code = code;
    this.station = station;
    Object.setPrototypeOf(this, MetarDecodeError.prototype);
  }
}
