import { createHash, timingSafeEqual } from 'crypto';
import { Identity } from '../domain/entities/Identity';
import { UnauthorizedError } from '../domain/errors/GatewayErrors';

/**
 * Maps API keys to the identity they belong to. Built once at startup and
 * never mutated.
 */
export class AuthGate {
    private readonly entries: ReadonlyArray<{ digest: Buffer; identity: Identity }>;

    constructor(credentials: ReadonlyMap<string, string>) {
        this.entries = Object.freeze(
            [...credentials.entries()]
                .filter(([key]) => key.length > 0)
                .map(([key, label]) => ({ digest: digest(key), identity: Object.freeze({ label }) }))
        );
    }

    get size(): number {
        return this.entries.length;
    }

    /**
     * Resolves a credential to its identity. Every failure reads the same.
     */
    authorize(credential: string | undefined): Identity {
        if (!credential) {
            throw new UnauthorizedError();
        }

        const candidate = digest(credential);
        let match: Identity | undefined;
        // Every key is compared; timing must not depend on which one matches.
        for (const entry of this.entries) {
            if (timingSafeEqual(entry.digest, candidate) && !match) {
                match = entry.identity;
            }
        }

        if (!match) {
            throw new UnauthorizedError();
        }
        return match;
    }

    /**
     * Extracts the token from an `Authorization: Bearer <token>` header.
     */
    static credentialFromHeader(header: string | undefined): string | undefined {
        if (!header) return undefined;
        const parts = header.trim().split(/\s+/);
        if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
            return undefined;
        }
        return parts[1];
    }
}

function digest(value: string): Buffer {
    return createHash('sha256').update(value, 'utf8').digest();
}
