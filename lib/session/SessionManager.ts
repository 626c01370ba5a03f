import type { Credential, Session, TokenPair } from '../../types';
import type { IdentityProvider } from '../godaikin/CloudApi';
import {
  InvalidCredentialsError,
  SessionExpiredError,
  UnauthorizedError,
  errorMessage,
} from '../godaikin/errors';
import type { Logger } from '../logger';
import { withTimeout } from '../timeout';

export interface SessionManagerOptions {
  provider: IdentityProvider;
  /** Renew this long before `expiresAt` to absorb clock drift */
  safetyMarginMs?: number;
  authTimeoutMs?: number;
  logger?: Logger;
  debug?: boolean;
}

/**
 * Owns the token pair for one account. Callers go through `ensureValid` or
 * `withSession`; overlapping renewals share a single exchange.
 */
export class SessionManager {
  private readonly provider: IdentityProvider;
  private readonly safetyMarginMs: number;
  private readonly authTimeoutMs: number;
  private readonly logger?: Logger;
  private readonly debug: boolean;
  private session: Session | null = null;
  private credential: Credential | null = null;
  private renewal: Promise<Session> | null = null;

  constructor(options: SessionManagerOptions) {
    this.provider = options.provider;
    this.safetyMarginMs = options.safetyMarginMs ?? 5 * 60 * 1000;
    this.authTimeoutMs = options.authTimeoutMs ?? 15000;
    this.logger = options.logger;
    this.debug = Boolean(options.debug);
  }

  async authenticate(credential: Credential): Promise<Session> {
    this.credential = { ...credential };
    try {
      return await this.login(credential);
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        this.credential = null;
      }
      throw error;
    }
  }

  async ensureValid(): Promise<Session> {
    if (this.session && this.isFresh(this.session)) {
      return this.session;
    }

    if (!this.renewal) {
      this.renewal = this.renew().finally(() => {
        this.renewal = null;
      });
    }
    return this.renewal;
  }

  /**
   * Runs `fn` with a valid bearer token. A token the API refuses despite its
   * expiry is dropped and `fn` is retried once with a renewed session.
   */
  async withSession<T>(fn: (accessToken: string) => Promise<T>): Promise<T> {
    const session = await this.ensureValid();
    try {
      return await fn(session.accessToken);
    } catch (error) {
      if (!(error instanceof UnauthorizedError)) {
        throw error;
      }
      this.logDebug('Access token refused by API, renewing session');
      if (this.session?.accessToken === session.accessToken) {
        this.session = { ...session, expiresAt: 0 };
      }
      const renewed = await this.ensureValid();
      return fn(renewed.accessToken);
    }
  }

  /** Drops the token pair; the next use logs in again with the held credential. */
  invalidate(): void {
    this.session = null;
  }

  logout(): void {
    this.session = null;
    this.credential = null;
    this.logInfo('Logged out');
  }

  getSession(): Readonly<Session> | null {
    return this.session ? { ...this.session } : null;
  }

  hasCredential(): boolean {
    return this.credential !== null;
  }

  private isFresh(session: Session): boolean {
    return session.expiresAt - this.safetyMarginMs > Date.now();
  }

  private async renew(): Promise<Session> {
    const current = this.session;
    if (current) {
      try {
        const tokens = await withTimeout(this.provider.refresh(current.refreshToken), this.authTimeoutMs, 'Token refresh');
        this.logDebug('Session refreshed');
        return this.store(tokens);
      } catch (error) {
        if (!(error instanceof SessionExpiredError)) {
          this.logError('Token refresh failed: %s', errorMessage(error));
          throw error;
        }
        this.logInfo('Refresh token rejected, falling back to full login');
        this.session = null;
      }
    }

    const credential = this.credential;
    if (!credential) {
      throw new SessionExpiredError();
    }
    try {
      return await this.login(credential);
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        this.credential = null;
      }
      throw error;
    }
  }

  private async login(credential: Credential): Promise<Session> {
    try {
      const tokens = await withTimeout(this.provider.login(credential), this.authTimeoutMs, 'Login');
      this.logInfo('Authenticated, session valid for %ds', tokens.expiresIn);
      return this.store(tokens);
    } catch (error) {
      this.session = null;
      this.logError('Login failed: %s', errorMessage(error));
      throw error;
    }
  }

  private store(tokens: TokenPair): Session {
    const session: Session = {
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      expiresAt: Date.now() + tokens.expiresIn * 1000,
    };
    this.session = session;
    return session;
  }

  private logInfo(message: string, ...args: unknown[]): void {
    this.logger?.log(this.formatLog(message), ...args);
  }

  private logDebug(message: string, ...args: unknown[]): void {
    if (this.debug) {
      this.logInfo(message, ...args);
    }
  }

  private logError(message: string, ...args: unknown[]): void {
    this.logger?.error(this.formatLog(message), ...args);
  }

  private formatLog(message: string): string {
    return `[SessionManager] ${message}`;
  }
}

export default SessionManager;
