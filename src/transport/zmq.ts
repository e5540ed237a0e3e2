import { Publisher, Subscriber } from 'zeromq';
import { TransportError } from '../errors.js';
import logger from '../logger.js';
import type {
  EndpointConfig,
  PublisherTransport,
  SubscriberTransport,
  SubscriberTransportOptions
} from './index.js';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null) {
    const code: unknown = Reflect.get(error, 'code');
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

async function attach(socket: Subscriber | Publisher, endpoints: EndpointConfig) {
  for (const endpoint of endpoints.bind) {
    try {
      await socket.bind(endpoint);
    } catch (error) {
      throw new TransportError(`Failed to bind ${endpoint}`, { cause: error });
    }
    logger.info({ endpoint }, 'Socket bound');
  }
  for (const endpoint of endpoints.connect) {
    try {
      socket.connect(endpoint);
    } catch (error) {
      throw new TransportError(`Failed to connect ${endpoint}`, { cause: error });
    }
    logger.info({ endpoint }, 'Socket connected');
  }
}

export class ZmqSubscriberTransport implements SubscriberTransport {
  private readonly socket: Subscriber;

  private constructor(socket: Subscriber) {
    this.socket = socket;
  }

  static async open(options: SubscriberTransportOptions): Promise<ZmqSubscriberTransport> {
    const socket = new Subscriber({ receiveTimeout: options.pollTimeoutMs });
    try {
      await attach(socket, options);
    } catch (error) {
      socket.close();
      throw error;
    }

    if (options.topics.length === 0) {
      socket.subscribe();
    } else {
      socket.subscribe(...options.topics);
    }
    return new ZmqSubscriberTransport(socket);
  }

  async receive(): Promise<Buffer[] | null> {
    try {
      return await this.socket.receive();
    } catch (error) {
      if (errorCode(error) === 'EAGAIN') {
        return null;
      }
      throw new TransportError('Failed to receive message', { cause: error });
    }
  }

  close() {
    if (!this.socket.closed) {
      this.socket.close();
    }
  }
}

export class ZmqPublisherTransport implements PublisherTransport {
  private readonly socket: Publisher;

  private constructor(socket: Publisher) {
    this.socket = socket;
  }

  static async open(endpoints: EndpointConfig): Promise<ZmqPublisherTransport> {
    const socket = new Publisher();
    try {
      await attach(socket, endpoints);
    } catch (error) {
      socket.close();
      throw error;
    }
    return new ZmqPublisherTransport(socket);
  }

  async send(parts: Buffer[]): Promise<void> {
    try {
      await this.socket.send(parts);
    } catch (error) {
      throw new TransportError('Failed to send message', { cause: error });
    }
  }

  close() {
    if (!this.socket.closed) {
      this.socket.close();
    }
  }
}

export async function openZmqSubscriber(
  options: SubscriberTransportOptions
): Promise<SubscriberTransport> {
  return ZmqSubscriberTransport.open(options);
}
