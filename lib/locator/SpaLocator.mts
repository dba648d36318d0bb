/**
 * UDP Spa Locator
 *
 * Finds spas by sending a hello datagram to the discovery port, either
 * broadcast or directly to a configured address, and collecting the
 * `<HELLO>IDENT|NAME</HELLO>` replies:
 * - Re-sends the hello until the discovery timeout elapses
 * - Stops early once the configured identifier (or, with only an address,
 *   any spa) has answered
 * - Fires `locating-discovered-spa` for every new spa
 */

import dgram from 'node:dgram';
import { PROTOCOL_CONFIG, SPA_EVENTS } from '../SpaProtocol.mjs';
import { ERROR_CODES, SpaManagerError } from '../errors.mjs';
import { createLogger, type Logger } from '../utils/Logger.mjs';
import { SpaDescriptor } from './SpaDescriptor.mjs';
import type {
  DatagramEndpoint,
  DatagramTransport,
  DatagramTransportFactory,
  LocatorOptions,
  LoggerFunction,
  SpaEventCallback,
  SpaLocator,
  SpaManagerView,
} from '../types.mjs';

// ============================================================================
// Discovery Configuration
// ============================================================================

export interface DiscoveryTiming {
  resendInterval: number; // ms between hello datagrams
  timeout: number; // ms before discovery gives up
}

export const DEFAULT_DISCOVERY_TIMING: DiscoveryTiming = {
  resendInterval: PROTOCOL_CONFIG.TIMEOUTS.DISCOVERY_INITIAL,
  timeout: PROTOCOL_CONFIG.TIMEOUTS.DISCOVERY,
};

export interface UdpSpaLocatorOptions extends LocatorOptions {
  createTransport?: DatagramTransportFactory;
  timing?: Partial<DiscoveryTiming>;
  logger?: LoggerFunction;
}

// ============================================================================
// Hello Protocol
// ============================================================================

const HELLO_RESPONSE = /^<HELLO>([^|<]+)\|([^<]*)<\/HELLO>$/;

/**
 * Parse a hello reply into identifier and name; null if it is not one
 */
export function parseHelloResponse(data: Buffer): { identifier: string; name: string } | null {
  const match = HELLO_RESPONSE.exec(data.toString(PROTOCOL_CONFIG.DISCOVERY.ENCODING).trim());
  if (!match) return null;

  const [, identifier, name] = match;
  if (identifier === undefined || name === undefined) return null;
  return { identifier, name };
}

/** The part of a datagram socket needed to bind it */
export interface BindableSocket {
  once(event: 'error', listener: (err: Error) => void): unknown;
  off(event: 'error', listener: (err: Error) => void): unknown;
  bind(callback: () => void): unknown;
  close(): unknown;
}

/**
 * Bind to an ephemeral port; the socket is closed if binding fails
 */
export function bindSocket(socket: BindableSocket): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onBindError = (err: Error) => {
      socket.close();
      reject(err);
    };
    socket.once('error', onBindError);
    socket.bind(() => {
      socket.off('error', onBindError);
      resolve();
    });
  });
}

/**
 * Default transport on a node:dgram udp4 socket
 */
export const createDgramTransport: DatagramTransportFactory = async ({ broadcast }) => {
  const socket = dgram.createSocket('udp4');
  await bindSocket(socket);

  if (broadcast) {
    socket.setBroadcast(true);
  }

  return {
    send: (data, endpoint) =>
      new Promise<void>((resolve, reject) => {
        socket.send(data, endpoint.port, endpoint.address, (err) => {
          if (err) reject(err);
          else resolve();
        });
      }),
    onMessage: (callback) => {
      socket.on('message', (msg, rinfo) => {
        callback(msg, { address: rinfo.address, port: rinfo.port });
      });
    },
    onError: (callback) => {
      socket.on('error', callback);
    },
    close: () => {
      socket.close();
    },
  };
};

// ============================================================================
// UdpSpaLocator Class
// ============================================================================

export class UdpSpaLocator implements SpaLocator {
  private clientId: Buffer;
  private onEvent: SpaEventCallback;
  private spaAddress: string | null;
  private spaIdentifier: string | null;
  private createTransport: DatagramTransportFactory;
  private timing: DiscoveryTiming;
  private logger: Logger;

  private found: SpaDescriptor[] = [];
  private announced: number = 0;
  private failure: Error | null = null;
  private wakeUp: (() => void) | null = null;

  constructor(manager: SpaManagerView, onEvent: SpaEventCallback, options: UdpSpaLocatorOptions) {
    this.clientId = manager.clientId;
    this.onEvent = onEvent;
    this.spaAddress = options.spaAddress;
    this.spaIdentifier = options.spaIdentifier;
    this.createTransport = options.createTransport ?? createDgramTransport;
    this.timing = { ...DEFAULT_DISCOVERY_TIMING, ...options.timing };
    this.logger = createLogger('SpaLocator', options.logger);
  }

  get spas(): readonly SpaDescriptor[] {
    return this.found;
  }

  /**
   * True once no further replies are needed
   */
  private get isComplete(): boolean {
    if (this.spaIdentifier !== null || this.spaAddress !== null) {
      return this.found.length > 0;
    }
    return false;
  }

  async discover(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const destination: DatagramEndpoint = {
      address: this.spaAddress ?? PROTOCOL_CONFIG.DISCOVERY.BROADCAST_ADDRESS,
      port: PROTOCOL_CONFIG.DISCOVERY.PORT,
    };
    const hello = Buffer.from(
      PROTOCOL_CONFIG.DISCOVERY.HELLO_REQUEST,
      PROTOCOL_CONFIG.DISCOVERY.ENCODING
    );

    this.logger.log(
      `Discovering spas via ${destination.address}:${destination.port}` +
        (this.spaIdentifier ? ` (looking for ${this.spaIdentifier})` : '')
    );

    const transport = await this.createTransport({ broadcast: this.spaAddress === null });
    this.attach(transport);

    try {
      const deadline = Date.now() + this.timing.timeout;
      let nextSend = Date.now();

      for (;;) {
        signal?.throwIfAborted();
        await this.announceNewSpas();

        if (this.failure) {
          throw new SpaManagerError(ERROR_CODES.DISCOVERY_FAILED, this.failure.message, {
            cause: this.failure,
          });
        }
        if (this.isComplete || Date.now() >= deadline) break;

        if (Date.now() >= nextSend) {
          await transport.send(hello, destination);
          nextSend = Date.now() + this.timing.resendInterval;
        }

        // replies that arrived while sending are handled before waiting again
        if (this.announced < this.found.length || this.failure) continue;

        await this.waitForReply(Math.min(nextSend, deadline) - Date.now(), signal);
      }
      signal?.throwIfAborted();
    } finally {
      this.wakeUp = null;
      transport.close();
    }

    this.logger.log(`Discovery finished, found ${this.found.length} spa(s)`);
  }

  private attach(transport: DatagramTransport): void {
    transport.onMessage((data, remote) => {
      this.handleReply(data, remote);
    });
    transport.onError((error) => {
      this.logger.error('Discovery socket error:', error);
      this.failure = error;
      this.wakeUp?.();
    });
  }

  private handleReply(data: Buffer, remote: DatagramEndpoint): void {
    const hello = parseHelloResponse(data);
    if (!hello) return;

    if (this.spaIdentifier !== null && hello.identifier !== this.spaIdentifier) {
      return;
    }
    if (this.found.some((spa) => spa.identifier === hello.identifier)) {
      return;
    }

    const descriptor = new SpaDescriptor(
      this.clientId,
      hello.identifier,
      hello.name,
      remote.address,
      remote.port
    );
    this.logger.log(`Found spa ${descriptor}`);
    this.found.push(descriptor);
    this.wakeUp?.();
  }

  private async announceNewSpas(): Promise<void> {
    while (this.announced < this.found.length) {
      const spaDescriptor = this.found[this.announced];
      this.announced++;
      if (spaDescriptor) {
        await this.onEvent(SPA_EVENTS.LOCATING_DISCOVERED_SPA, { spaDescriptor });
      }
    }
  }

  /**
   * Wait until a reply or socket error arrives, or the delay elapses
   */
  private waitForReply(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const settle = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.wakeUp = null;
      };
      const onAbort = () => {
        settle();
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        settle();
        resolve();
      }, Math.max(ms, 0));

      this.wakeUp = () => {
        settle();
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Locator factory used when the host does not supply one
 */
export function createUdpLocator(
  manager: SpaManagerView,
  onEvent: SpaEventCallback,
  options: LocatorOptions
): SpaLocator {
  return new UdpSpaLocator(manager, onEvent, options);
}
