import type { VerifiedIdentity } from "@resumeflow/shared/types";

// Set by the authenticate middleware on routes that require a bearer token.
declare global {
	// eslint-disable-next-line @typescript-eslint/no-namespace
	namespace Express {
		interface Request {
			identity?: VerifiedIdentity;
		}
	}
}

export {};
