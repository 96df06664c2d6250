import { DriverFetchError } from "./DriverFetchError";

export class HttpStatusError extends DriverFetchError {
  status: number;
  statusText: string;
  url: string;

  constructor(url: string, status: number, statusText: string) {
    super("HTTP_STATUS", `Request to ${url} failed with status ${status}`);

    this.name = "HttpStatusError";
    this.status = status;
    this.statusText = statusText;
    this.url = url;
  }
}
