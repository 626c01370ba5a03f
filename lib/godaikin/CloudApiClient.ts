import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { Credential, DeviceDescriptor, RawCommand, RawState, TokenPair } from '../../types';
import type { CloudApi, CommandReceipt, SendOptions } from './CloudApi';
import {
  InvalidCredentialsError,
  ProviderUnavailableError,
  SessionExpiredError,
  toProviderError,
} from './errors';
import { mapDevicesFromResponse } from './Mappers';
import RateLimiter from './RateLimiter';
import type { Logger } from '../logger';

export const DEFAULT_REGION = 'ap-southeast-1';
export const DEFAULT_COGNITO_CLIENT_ID = '36f6piu770fotfscvhi3jb1vb7';
export const DEFAULT_API_BASE_URL = 'https://c7zkf7l933.execute-api.ap-southeast-1.amazonaws.com/prod/';

const COGNITO_TARGET = 'AWSCognitoIdentityProviderService.InitiateAuth';
const REJECTED_AUTH_TYPES = new Set(['NotAuthorizedException', 'UserNotFoundException', 'PasswordResetRequiredException']);

interface CognitoAuthResult {
  AccessToken?: string;
  IdToken?: string;
  RefreshToken?: string;
  ExpiresIn?: number;
}

interface CognitoInitiateAuthResponse {
  AuthenticationResult?: CognitoAuthResult;
  ChallengeName?: string;
}

interface RequestOptions {
  /** Retry 429 and 5xx responses inside the client */
  retry: boolean;
  signal?: AbortSignal;
}

interface CognitoErrorBody {
  __type?: string;
  message?: string;
}

export interface CloudApiClientOptions {
  /** Account name the vendor API expects inside every request body */
  account: string;
  rateLimiter: RateLimiter;
  logger?: Logger;
  debug?: boolean;
  region?: string;
  cognitoClientId?: string;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const delay = async (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class CloudApiClient implements CloudApi {
  private readonly http: AxiosInstance;
  private readonly cognito: AxiosInstance;
  private readonly account: string;
  private readonly clientId: string;
  private readonly rateLimiter: RateLimiter;
  private readonly logger?: Logger;
  private readonly debug: boolean;
  private readonly maxRetries: number;

  constructor(options: CloudApiClientOptions) {
    this.account = options.account;
    this.rateLimiter = options.rateLimiter;
    this.logger = options.logger;
    this.debug = Boolean(options.debug);
    this.clientId = options.cognitoClientId ?? DEFAULT_COGNITO_CLIENT_ID;
    this.maxRetries = options.maxRetries ?? 4;

    const timeout = options.timeout ?? 20000;
    this.http = axios.create({
      baseURL: options.baseUrl ?? DEFAULT_API_BASE_URL,
      timeout,
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
      },
    });

    this.cognito = axios.create({
      baseURL: `https://cognito-idp.${options.region ?? DEFAULT_REGION}.amazonaws.com/`,
      timeout,
      headers: {
        'Content-Type': 'application/x-amz-json-1.1',
        'X-Amz-Target': COGNITO_TARGET,
      },
    });
  }

  async login(credential: Credential): Promise<TokenPair> {
    const result = await this.initiateAuth('USER_PASSWORD_AUTH', {
      USERNAME: credential.username,
      PASSWORD: credential.password,
    });

    const tokens = this.parseTokens(result);
    if (!tokens) {
      throw new InvalidCredentialsError('GO DAIKIN login returned no AuthenticationResult');
    }
    this.logDebug('Authenticated GO DAIKIN account, token valid for %ds', tokens.expiresIn);
    return tokens;
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    const result = await this.initiateAuth('REFRESH_TOKEN_AUTH', { REFRESH_TOKEN: refreshToken });

    // Cognito does not rotate refresh tokens; keep the one we have.
    const tokens = this.parseTokens(result, refreshToken);
    if (!tokens) {
      throw new SessionExpiredError('GO DAIKIN token refresh returned no AuthenticationResult');
    }
    this.logDebug('Refreshed GO DAIKIN token, valid for %ds', tokens.expiresIn);
    return tokens;
  }

  async listDevices(token: string): Promise<DeviceDescriptor[]> {
    const response = await this.request<unknown>(
      token,
      {
        url: 'gethomepageinfowithsubscription',
        data: {
          requestData: {
            type: 1,
            value: this.account,
          },
        },
      },
      'listDevices',
      { retry: true },
    );
    return mapDevicesFromResponse(response);
  }

  async getStatus(token: string, device: DeviceDescriptor): Promise<RawState> {
    // An empty desired state makes the unit publish a fresh report before we read it.
    await this.publishDesired(token, device, {}, { retry: true });

    const response = await this.request<unknown>(
      token,
      {
        url: 'publishdevicestate',
        data: {
          requestData: {
            type: 1,
            username: this.account,
            thingName: device.thingName,
            key: device.shadowKey,
          },
        },
      },
      `getStatus(${device.id})`,
      { retry: true },
    );
    return this.extractShadow(response);
  }

  async sendCommand(
    token: string,
    device: DeviceDescriptor,
    command: RawCommand,
    options: SendOptions = {},
  ): Promise<CommandReceipt> {
    const receipt = await this.publishDesired(token, device, command, { retry: false, signal: options.signal });
    this.logDebug('Set state for %s: %j', device.id, command);
    return receipt;
  }

  private async publishDesired(
    token: string,
    device: DeviceDescriptor,
    command: RawCommand,
    options: RequestOptions,
  ): Promise<CommandReceipt> {
    const response = await this.request<unknown>(
      token,
      {
        url: 'publishdevicestate',
        data: {
          requestData: {
            type: 3,
            username: this.account,
            thingName: device.thingName,
            key: device.shadowKey,
            payload: { state: { desired: command } },
          },
        },
      },
      `sendCommand(${device.id})`,
      options,
    );
    return { accepted: true, raw: response };
  }

  private async initiateAuth(flow: string, parameters: Record<string, string>): Promise<CognitoInitiateAuthResponse> {
    try {
      return await this.rateLimiter.schedule(async () => {
        const response = await this.cognito.request<CognitoInitiateAuthResponse>({
          method: 'POST',
          data: {
            ClientId: this.clientId,
            AuthFlow: flow,
            AuthParameters: parameters,
          },
        });
        return response.data;
      }, flow);
    } catch (error) {
      throw this.classifyAuthError(error, flow);
    }
  }

  private classifyAuthError(error: unknown, flow: string): Error {
    if (axios.isAxiosError<CognitoErrorBody>(error)) {
      const status = error.response?.status;
      const type = error.response?.data?.__type ?? '';
      const shortType = type.split('#').pop() ?? type;
      this.logError('%s failed (%s): %s', flow, status ?? 'network', shortType || error.message);

      if (status !== undefined && status < 500 && REJECTED_AUTH_TYPES.has(shortType)) {
        return flow === 'REFRESH_TOKEN_AUTH'
          ? new SessionExpiredError('GO DAIKIN refresh token rejected', { cause: error })
          : new InvalidCredentialsError(undefined, { cause: error });
      }
      if (status === undefined || status === 429 || status >= 500) {
        return new ProviderUnavailableError(`Identity provider unavailable: ${error.message}`, { cause: error, status });
      }
    }
    return toProviderError(error, flow);
  }

  private parseTokens(response: CognitoInitiateAuthResponse, previousRefreshToken?: string): TokenPair | undefined {
    const auth = response.AuthenticationResult;
    const accessToken = auth?.IdToken ?? auth?.AccessToken;
    const refreshToken = auth?.RefreshToken ?? previousRefreshToken;
    if (!accessToken || !refreshToken) {
      if (response.ChallengeName) {
        this.logError('Unhandled Cognito challenge %s', response.ChallengeName);
      }
      return undefined;
    }

    return {
      accessToken,
      refreshToken,
      expiresIn: auth?.ExpiresIn ?? 3600,
    };
  }

  private extractShadow(response: unknown): RawState {
    if (!isRecord(response)) {
      return {};
    }
    for (const candidate of [response.data, response.state, response]) {
      if (!isRecord(candidate)) {
        continue;
      }
      const nested = isRecord(candidate.state) ? candidate.state.reported : undefined;
      const reported = nested ?? candidate.reported;
      if (isRecord(reported)) {
        return reported;
      }
      if ('Set_OnOff' in candidate) {
        return candidate;
      }
    }
    return response;
  }

  private async request<T>(token: string, config: AxiosRequestConfig, label: string, options: RequestOptions): Promise<T> {
    const { signal } = options;
    for (let attempt = 0; ; attempt += 1) {
      try {
        const response = await this.rateLimiter.schedule(async () => {
          if (signal?.aborted) {
            throw new ProviderUnavailableError(`${label} cancelled before it was sent`);
          }
          return this.http.request<T>({
            method: 'POST',
            ...config,
            ...(signal ? { signal } : {}),
            headers: {
              ...(config.headers ?? {}),
              authorization: token,
            },
          });
        }, label);
        return response.data;
      } catch (error) {
        const classified = toProviderError(error, label);
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        this.logError('Request %s failed (%s): %s', label, status ?? 'network', classified.message);

        const retryable = options.retry && status !== undefined && (status === 429 || status >= 500);
        if (retryable && attempt < this.maxRetries - 1) {
          const backoff = Math.min(1000 * Math.pow(2, attempt), 15000);
          this.logDebug('Request %s throttled, retrying in %dms', label, backoff);
          await delay(backoff);
          continue;
        }

        throw classified;
      }
    }
  }

  private logDebug(message: string, ...args: unknown[]): void {
    if (this.debug) {
      this.logger?.log(this.formatLog(message), ...args);
    }
  }

  private logError(message: string, ...args: unknown[]): void {
    this.logger?.error(this.formatLog(message), ...args);
  }

  private formatLog(message: string): string {
    return `[CloudApiClient] ${message}`;
  }
}

export default CloudApiClient;
