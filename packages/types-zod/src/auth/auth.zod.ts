import {z} from 'zod';

/**
 * Role of a verified identity.
 * - `authenticated`: produced from a verified bearer token
 * - `service`: synthesized for internal calls acting for a known subject
 */
export const IdentityRoleZ = z.enum(['authenticated', 'service']);

export const IdentityZ = z.object({
    sub: z.string().min(1),
    role: IdentityRoleZ,
});

/**
 * Claims of an access token issued by the identity provider.
 * Every claim is optional here; the validator decides which ones are required.
 */
export const AccessTokenClaimsZ = z.object({
    sub: z.string().optional(),
    exp: z.number().optional(),
    iat: z.number().optional(),
    role: z.string().optional(),
    email: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    iss: z.string().optional(),
    session_id: z.string().optional(),
});

export const WhoAmIViewZ = IdentityZ.pick({sub: true, role: true});

export type IdentityRole = z.infer<typeof IdentityRoleZ>;
export type Identity = Readonly<z.infer<typeof IdentityZ>>;
export type AccessTokenClaims = z.infer<typeof AccessTokenClaimsZ>;
export type WhoAmIView = z.infer<typeof WhoAmIViewZ>;
