/** Identity advertised to the bridged process during the health probe handshake. */
export const BRIDGE_NAME = "stdio-fanout-bridge";
export const BRIDGE_VERSION = "1.0.0";
