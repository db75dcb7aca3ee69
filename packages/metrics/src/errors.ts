/** A report was not delivered. `detail` is the text the service or the network gave. */
export class DeliveryError extends Error {
  readonly detail: string;

  constructor(detail: string, options?: { cause?: unknown }) {
    super(detail, options);
    this.name = "DeliveryError";
    this.detail = detail;
  }
}
