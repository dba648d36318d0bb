/**
 * Data identifying one discovered spa, prior to any connection
 */

import type { DatagramEndpoint } from '../types.mjs';

export class SpaDescriptor {
  readonly clientId: Buffer;
  readonly identifier: string;
  readonly name: string;
  readonly ipAddress: string;
  readonly port: number;

  constructor(
    clientId: Buffer,
    identifier: string,
    name: string,
    ipAddress: string,
    port: number
  ) {
    this.clientId = clientId;
    this.identifier = identifier;
    this.name = name;
    this.ipAddress = ipAddress;
    this.port = port;
  }

  get destination(): DatagramEndpoint {
    return { address: this.ipAddress, port: this.port };
  }

  toString(): string {
    return `${this.name}(${this.identifier}) at ${this.ipAddress}:${this.port}`;
  }
}
