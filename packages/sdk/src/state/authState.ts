/**
 * Authentication routing: which root screen the app shows, and the
 * transitions between them.
 */

import type { ApiClient } from '../api-client';
import { isApiError, requiresReauthentication } from '../models';
import type { AppleSignInRequest, UserProfile } from '../models';

export type AuthenticationState = 'loading' | 'signedOut' | 'needsProfileSetup' | 'signedIn';

export interface AuthStateInput {
  hasSignedIn: boolean;
  isProfileComplete: boolean;
  hasMinimalProfileData: boolean;
  isAnonymous: boolean;
  isQuickStart: boolean;
}

export function resolveAuthState(input: AuthStateInput): AuthenticationState {
  if (!input.hasSignedIn) return 'signedOut';
  if (input.isProfileComplete) return 'signedIn';
  if (input.isAnonymous || input.isQuickStart || input.hasMinimalProfileData) return 'signedIn';
  return 'needsProfileSetup';
}

export type ProfileSnapshot = Pick<UserProfile, 'fullName' | 'birthTime'>;

export function hasMinimalProfileData(profile: Partial<ProfileSnapshot> | null): boolean {
  return (profile?.fullName ?? '').trim().length > 0;
}

export function isProfileComplete(profile: Partial<ProfileSnapshot> | null): boolean {
  return hasMinimalProfileData(profile) && (profile?.birthTime ?? '').trim().length > 0;
}

/** Where the session token lives between launches (keychain, secure storage, ...). */
export interface SessionTokenStore {
  getToken(): Promise<string | null>;
  setToken(token: string): Promise<void>;
  clearToken(): Promise<void>;
}

export interface BootstrapOptions {
  profile?: Partial<ProfileSnapshot> | null;
  isAnonymous?: boolean;
  isQuickStart?: boolean;
}

export interface AuthStateControllerOptions {
  api: Pick<ApiClient, 'auth'>;
  tokenStore: SessionTokenStore;
  enableLogging?: boolean;
}

type Listener = (state: AuthenticationState) => void;

export class AuthStateController {
  private currentState: AuthenticationState = 'loading';
  private readonly listeners = new Set<Listener>();
  private hasSignedIn = false;
  private anonymous = false;
  private quickStart = false;
  private profile: Partial<ProfileSnapshot> | null = null;

  constructor(private readonly options: AuthStateControllerOptions) {}

  get state(): AuthenticationState {
    return this.currentState;
  }

  get isAnonymous(): boolean {
    return this.anonymous;
  }

  get isQuickStart(): boolean {
    return this.quickStart;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves the launch state from the stored token and local profile, then
   * checks the token with the API. An invalid token signs the user out;
   * network failures keep the local state.
   */
  async bootstrap(options: BootstrapOptions = {}): Promise<AuthenticationState> {
    const token = await this.options.tokenStore.getToken();
    this.profile = options.profile ?? null;
    this.anonymous = options.isAnonymous ?? false;
    this.quickStart = options.isQuickStart ?? false;
    this.hasSignedIn = token !== null || this.anonymous || this.quickStart;
    this.setState(this.resolve());

    if (!token) {
      return this.currentState;
    }

    try {
      const { valid } = await this.options.api.auth.validate();
      if (!valid) {
        await this.handleTokenExpired();
      }
    } catch (error) {
      if (isApiError(error) && requiresReauthentication(error)) {
        await this.handleTokenExpired();
      } else {
        this.log('Token check failed, keeping local session', error);
      }
    }

    return this.currentState;
  }

  async signIn(request: AppleSignInRequest): Promise<UserProfile> {
    const session = await this.options.api.auth.signInWithApple(request);
    await this.options.tokenStore.setToken(session.jwtToken);

    this.hasSignedIn = true;
    this.anonymous = false;
    this.quickStart = false;
    this.profile = { ...session.user, ...pickFilled(this.profile) };
    this.setState(isProfileComplete(this.profile) ? 'signedIn' : 'needsProfileSetup');
    return session.user;
  }

  continueAsGuest(): void {
    this.anonymous = true;
    this.hasSignedIn = true;
    this.setState(
      isProfileComplete(this.profile) || hasMinimalProfileData(this.profile)
        ? 'signedIn'
        : 'needsProfileSetup',
    );
  }

  startQuickStart(): void {
    this.quickStart = true;
    this.hasSignedIn = true;
    this.setState('needsProfileSetup');
  }

  completeProfileSetup(profile: Partial<ProfileSnapshot>): void {
    this.profile = { ...this.profile, ...profile };
    this.setState('signedIn');
  }

  /** Leaves the app signed out even when the logout call fails. */
  async signOut(): Promise<void> {
    this.resetSession();
    try {
      await this.options.api.auth.logout();
    } catch (error) {
      this.log('Logout request failed', error);
    } finally {
      await this.options.tokenStore.clearToken();
    }
  }

  async handleTokenExpired(): Promise<void> {
    if (this.currentState === 'signedOut') {
      return;
    }
    this.resetSession();
    await this.options.tokenStore.clearToken();
  }

  private resetSession(): void {
    this.hasSignedIn = false;
    this.anonymous = false;
    this.quickStart = false;
    this.setState('signedOut');
  }

  private resolve(): AuthenticationState {
    return resolveAuthState({
      hasSignedIn: this.hasSignedIn,
      isProfileComplete: isProfileComplete(this.profile),
      hasMinimalProfileData: hasMinimalProfileData(this.profile),
      isAnonymous: this.anonymous,
      isQuickStart: this.quickStart,
    });
  }

  private setState(next: AuthenticationState): void {
    if (next === this.currentState) {
      return;
    }
    this.currentState = next;
    this.listeners.forEach((listener) => listener(next));
  }

  private log(message: string, error: unknown): void {
    if (this.options.enableLogging) {
      console.warn(`[Auth] ${message}`, error);
    }
  }
}

function pickFilled(profile: Partial<ProfileSnapshot> | null): Partial<ProfileSnapshot> {
  const filled: Partial<ProfileSnapshot> = {};
  if (profile?.fullName) filled.fullName = profile.fullName;
  if (profile?.birthTime) filled.birthTime = profile.birthTime;
  return filled;
}
