import { UnexpectedPageStructureError } from '../../domain/errors/ReviewErrors';

/**
 * Cookies and anti-forgery tokens for one multi-step lookup (GET form, then POST).
 *
 * Create one per adapter invocation and drop it when the lookup ends;
 * server-side state tied to an earlier query must not bleed into the next domain.
 */
export class SessionContext {
    private readonly cookies = new Map<string, string>();
    private readonly tokens = new Map<string, string>();

    /**
     * Stores cookies from a Set-Cookie response header.
     */
    absorb(setCookie: unknown): void {
        const lines = Array.isArray(setCookie) ? setCookie : [setCookie];
        for (const line of lines) {
            if (typeof line !== 'string') continue;
            const pair = line.split(';')[0];
            const separator = pair.indexOf('=');
            if (separator <= 0) continue;
            const name = pair.substring(0, separator).trim();
            const value = pair.substring(separator + 1).trim();
            if (value) {
                this.cookies.set(name, value);
            } else {
                this.cookies.delete(name);
            }
        }
    }

    /**
     * Request headers for the next step: the given headers plus the session's cookies.
     */
    headers(extra: Record<string, string> = {}): Record<string, string> {
        const cookie = this.cookieHeader();
        return cookie ? { ...extra, Cookie: cookie } : { ...extra };
    }

    cookieHeader(): string {
        return [...this.cookies.entries()].map(([name, value]) => `${name}=${value}`).join('; ');
    }

    getCookie(name: string): string | undefined {
        return this.cookies.get(name);
    }

    setToken(name: string, value: string | undefined): void {
        if (value !== undefined) {
            this.tokens.set(name, value);
        }
    }

    /**
     * @throws UnexpectedPageStructureError when the token was never extracted
     */
    requireToken(name: string): string {
        const value = this.tokens.get(name);
        if (value === undefined) {
            throw new UnexpectedPageStructureError(name);
        }
        return value;
    }
}
