export type DriverFetchErrorCode = "HTTP_STATUS" | "UNSUPPORTED_OS";

export class DriverFetchError extends Error {
  code: DriverFetchErrorCode;

  constructor(code: DriverFetchErrorCode, message: string) {
    super(message);

    this.code = code;
    this.name = "DriverFetchError";
  }
}
