/** Pull side of the pub/sub transport. `null` means the poll timed out. */
export interface SubscriberTransport {
  receive(): Promise<Buffer[] | null>;
  close(): void;
}

export interface PublisherTransport {
  send(parts: Buffer[]): Promise<void>;
  close(): void;
}

export type EndpointConfig = {
  connect: string[];
  bind: string[];
};

export type SubscriberTransportOptions = EndpointConfig & {
  topics: string[];
  pollTimeoutMs: number;
};

export type SubscriberTransportFactory = (
  options: SubscriberTransportOptions
) => Promise<SubscriberTransport>;
