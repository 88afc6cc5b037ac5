import { parse as parseCookie, serialize as setCookie } from 'cookie';
import { constantTimeEqual, hmacHex } from '@launch-bridge/shared';

export const SESS_COOKIE = 'launch.sid';

export interface CookieOptions {
  secret: string;
  secure: boolean;
  maxAgeSeconds: number;
}

/**
 * Session id cookie signed as `{sid}.{hmac(sid)}`. Cross-site EHR launches
 * need SameSite=None, which browsers only accept together with Secure.
 */
export class SessionCookie {
  constructor(private readonly options: CookieOptions) {}

  read(cookieHeader: string | undefined): string | null {
    const raw = parseCookie(cookieHeader ?? '')[SESS_COOKIE];
    if (!raw) return null;
    const dot = raw.lastIndexOf('.');
    if (dot <= 0) return null;
    const sid = raw.slice(0, dot);
    const sig = raw.slice(dot + 1);
    if (!constantTimeEqual(hmacHex(this.options.secret, sid), sig)) return null;
    return sid;
  }

  serialize(sid: string): string {
    return setCookie(SESS_COOKIE, `${sid}.${hmacHex(this.options.secret, sid)}`, {
      httpOnly: true,
      sameSite: this.options.secure ? 'none' : 'lax',
      secure: this.options.secure,
      path: '/',
      maxAge: this.options.maxAgeSeconds,
    });
  }

  clear(): string {
    return setCookie(SESS_COOKIE, '', {
      httpOnly: true,
      sameSite: this.options.secure ? 'none' : 'lax',
      secure: this.options.secure,
      path: '/',
      maxAge: 0,
    });
  }
}
