/**
 * Mocha bootstrap keeping the suite hermetic: any attempt to reach the network
 * (sockets or the WHATWG `fetch`) fails fast with `E-NETWORK-BLOCKED`. Tests
 * exercise the transport through injected fetch stubs instead. The original
 * implementations are restored once the run finishes.
 */
import { after } from "mocha";
import { Socket } from "node:net";

type RestoreHook = () => void;

const restores: RestoreHook[] = [];

/** Environment variables read by the bridge, cleared so developer shells do not leak in. */
const BRIDGE_ENV_KEYS = [
  "GEPHI_API_URL",
  "GEPHI_REQUEST_TIMEOUT_MS",
  "GEPHI_CHECK_TIMEOUT_MS",
  "GEPHI_BRIDGE_LOG_FILE",
  "GEPHI_BRIDGE_LOG_LEVEL",
  "GEPHI_BRIDGE_LOG_REDACT",
];

class NetworkBlockedError extends Error {
  public readonly code = "E-NETWORK-BLOCKED";

  constructor(via: string) {
    super(`network access via ${via} is disabled during tests`);
    this.name = "NetworkBlockedError";
  }
}

function clearBridgeEnvironment(): void {
  for (const key of BRIDGE_ENV_KEYS) {
    const original = process.env[key];
    delete process.env[key];
    restores.push(() => {
      if (original !== undefined) {
        process.env[key] = original;
      }
    });
  }
}

function installNetworkGuards(): void {
  const originalSocketConnect = Socket.prototype.connect;
  Socket.prototype.connect = function blockedConnect(): never {
    throw new NetworkBlockedError("net.Socket#connect");
  };
  restores.push(() => {
    Socket.prototype.connect = originalSocketConnect;
  });

  const originalFetch = Object.getOwnPropertyDescriptor(globalThis, "fetch");
  Object.defineProperty(globalThis, "fetch", {
    configurable: true,
    writable: true,
    value: async (): Promise<never> => {
      throw new NetworkBlockedError("fetch");
    },
  });
  restores.push(() => {
    if (originalFetch) {
      Object.defineProperty(globalThis, "fetch", originalFetch);
    }
  });
}

clearBridgeEnvironment();
installNetworkGuards();

after(() => {
  while (restores.length > 0) {
    restores.pop()?.();
  }
});
