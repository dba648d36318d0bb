/**
 * Locator - Public API
 *
 * Barrel exports for spa discovery.
 */

export { SpaDescriptor } from './SpaDescriptor.mjs';

export {
  UdpSpaLocator,
  createUdpLocator,
  createDgramTransport,
  parseHelloResponse,
  DEFAULT_DISCOVERY_TIMING,
  type DiscoveryTiming,
  type UdpSpaLocatorOptions,
} from './SpaLocator.mjs';
