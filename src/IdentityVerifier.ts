/**
 * IdentityVerifier — Bearer Credential → UserProfile
 *
 * Calls the identity provider's userinfo endpoint with the caller's token.
 * A non-2xx answer means the credential was rejected; anything else that
 * goes wrong means the provider could not vouch for it.
 */
import { z } from 'zod';
import { type Result, ok, err } from './Result.js';
import { AuthenticationError, ErrorCodes } from './errors.js';
import { getJson } from './http.js';
import type { UserProfile } from './types.js';

export interface IdentityVerifier {
    verify(token: string): Promise<Result<UserProfile, AuthenticationError>>;
}

export const UserInfoSchema = z.object({
    sub: z.string().min(1),
    name: z.string(),
    email: z.string(),
    roles: z.array(z.string()).default([]),
    entitlements: z.object({
        categories: z.array(z.string()).default([]),
    }).default({}),
});

export type UserInfo = z.infer<typeof UserInfoSchema>;

export function toUserProfile(info: UserInfo): UserProfile {
    return Object.freeze({
        subjectId: info.sub,
        roles: new Set(info.roles),
        permittedCategories: new Set(info.entitlements.categories),
    });
}

export interface HttpIdentityVerifierOptions {
    readonly userinfoUrl: string;
    readonly timeoutMs: number;
}

export class HttpIdentityVerifier implements IdentityVerifier {
    private readonly userinfoUrl: string;
    private readonly timeoutMs: number;

    constructor(options: HttpIdentityVerifierOptions) {
        this.userinfoUrl = options.userinfoUrl;
        this.timeoutMs = options.timeoutMs;
    }

    async verify(token: string): Promise<Result<UserProfile, AuthenticationError>> {
        const response = await getJson(this.userinfoUrl, {
            timeoutMs: this.timeoutMs,
            headers: { Authorization: `Bearer ${token}` },
        });

        if (!response.ok) {
            const { reason, status, message } = response.error;
            if (reason === 'status') {
                return err(new AuthenticationError(
                    ErrorCodes.TOKEN_REJECTED,
                    `Identity provider rejected the credential (HTTP ${status ?? 'unknown'})`,
                    status,
                ));
            }
            return err(new AuthenticationError(ErrorCodes.IDENTITY_UNAVAILABLE, message));
        }

        const parsed = UserInfoSchema.safeParse(response.value);
        if (!parsed.success) {
            return err(new AuthenticationError(
                ErrorCodes.IDENTITY_UNAVAILABLE,
                'Identity provider returned an unrecognized userinfo document',
            ));
        }

        return ok(toUserProfile(parsed.data));
    }
}
