import type {
  Credential,
  DeviceDescriptor,
  RawCommand,
  RawState,
  TokenPair,
} from '../../types';

export interface SendOptions {
  /** Cancels the request if it has not completed yet */
  signal?: AbortSignal;
}

export interface CommandReceipt {
  accepted: boolean;
  raw?: unknown;
}

/**
 * Narrow boundary onto the identity provider and the vendor REST API.
 * Every call is network I/O; implementations hold no session state.
 */
export interface CloudApi {
  login(credential: Credential): Promise<TokenPair>;
  refresh(refreshToken: string): Promise<TokenPair>;
  listDevices(token: string): Promise<DeviceDescriptor[]>;
  getStatus(token: string, device: DeviceDescriptor): Promise<RawState>;
  /** One attempt only; the caller owns retries. */
  sendCommand(token: string, device: DeviceDescriptor, command: RawCommand, options?: SendOptions): Promise<CommandReceipt>;
}

export type IdentityProvider = Pick<CloudApi, 'login' | 'refresh'>;
