/**
 * ConnectivityMonitor - reports whether the remote API is reachable and over
 * which kind of link
 */

import { EventEmitter } from 'events';
import { lookup } from 'dns/promises';
import os from 'os';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export type NetworkType = 'wifi' | 'cellular' | 'ethernet' | 'none';

export interface ConnectivityStatus {
  isConnected: boolean;
  networkType: NetworkType;
}

export type ConnectivityListener = (status: ConnectivityStatus) => void;

export interface ConnectivityMonitor {
  isConnected(): Promise<boolean>;
  getNetworkType(): Promise<NetworkType>;
  onChange(listener: ConnectivityListener): () => void;
  start(): void;
  stop(): void;
}

const CHANGE_EVENT = 'change';

/**
 * Base class holding the last known status and the listener list
 */
abstract class BaseConnectivityMonitor implements ConnectivityMonitor {
  protected status: ConnectivityStatus = {
    isConnected: false,
    networkType: 'none',
  };
  private emitter = new EventEmitter();

  abstract isConnected(): Promise<boolean>;
  abstract getNetworkType(): Promise<NetworkType>;
  abstract start(): void;
  abstract stop(): void;

  onChange(listener: ConnectivityListener): () => void {
    this.emitter.on(CHANGE_EVENT, listener);
    return () => {
      this.emitter.off(CHANGE_EVENT, listener);
    };
  }

  protected update(next: ConnectivityStatus): void {
    const changed =
      next.isConnected !== this.status.isConnected ||
      next.networkType !== this.status.networkType;
    this.status = next;
    if (changed) {
      this.emitter.emit(CHANGE_EVENT, next);
    }
  }

  protected removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

/**
 * Connectivity driven by the host application, e.g. from a platform signal
 */
export class ManualConnectivityMonitor extends BaseConnectivityMonitor {
  constructor(initial: ConnectivityStatus = { isConnected: true, networkType: 'wifi' }) {
    super();
    this.status = initial;
  }

  async isConnected(): Promise<boolean> {
    return this.status.isConnected;
  }

  async getNetworkType(): Promise<NetworkType> {
    return this.status.networkType;
  }

  setStatus(status: ConnectivityStatus): void {
    this.update(status);
  }

  start(): void {}

  stop(): void {
    this.removeAllListeners();
  }
}

export type HostProbe = (hostname: string) => Promise<void>;
export type InterfaceReader = () => NodeJS.Dict<os.NetworkInterfaceInfo[]>;

export interface NetworkConnectivityOptions {
  hostname: string;
  intervalMs?: number;
  probe?: HostProbe;
  interfaces?: InterfaceReader;
}

const dnsProbe: HostProbe = async (hostname) => {
  await lookup(hostname);
};

/**
 * Classifies the link type from the names of active external interfaces
 */
export const classifyInterfaces = (
  interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]>,
): NetworkType => {
  const active = Object.entries(interfaces)
    .filter(([, infos]) => (infos ?? []).some((info) => !info.internal))
    .map(([name]) => name.toLowerCase());

  if (active.length === 0) return 'none';
  if (active.some((name) => name.startsWith('wl') || name.includes('wi-fi'))) {
    return 'wifi';
  }
  if (
    active.some(
      (name) =>
        name.startsWith('wwan') ||
        name.startsWith('rmnet') ||
        name.startsWith('ppp'),
    )
  ) {
    return 'cellular';
  }
  return 'ethernet';
};

/**
 * Polls DNS resolution of the API host and the local interface table
 */
export class NetworkConnectivityMonitor extends BaseConnectivityMonitor {
  private logger = createLogger('ConnectivityMonitor');
  private timer: NodeJS.Timeout | null = null;
  private readonly intervalMs: number;
  private readonly probe: HostProbe;
  private readonly interfaces: InterfaceReader;

  constructor(private readonly options: NetworkConnectivityOptions) {
    super();
    this.intervalMs = options.intervalMs ?? 30000;
    this.probe = options.probe ?? dnsProbe;
    this.interfaces = options.interfaces ?? os.networkInterfaces;
  }

  async isConnected(): Promise<boolean> {
    const status = await this.check();
    return status.isConnected;
  }

  async getNetworkType(): Promise<NetworkType> {
    const status = await this.check();
    return status.networkType;
  }

  /**
   * Probes once and notifies listeners when the status changed
   */
  async check(): Promise<ConnectivityStatus> {
    const networkType = classifyInterfaces(this.interfaces());
    let next: ConnectivityStatus;

    if (networkType === 'none') {
      next = { isConnected: false, networkType };
    } else {
      try {
        await this.probe(this.options.hostname);
        next = { isConnected: true, networkType };
      } catch (error) {
        this.logger.debug('Host probe failed', {
          hostname: this.options.hostname,
          error: errorMessage(error),
        });
        next = { isConnected: false, networkType: 'none' };
      }
    }

    this.update(next);
    return next;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.check().catch((error: unknown) => {
        this.logger.warn('Connectivity check failed', {
          error: errorMessage(error),
        });
      });
    }, this.intervalMs);
    this.timer.unref();
    this.logger.debug('Connectivity polling started', {
      intervalMs: this.intervalMs,
    });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.removeAllListeners();
  }
}
