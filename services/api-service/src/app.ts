import express, { type Express } from "express";
import type { Logger } from "@resumeflow/shared/utils";
import type { TokenVerifier } from "./keycloak/token-verifier";
import type { KeycloakAdmin } from "./keycloak/keycloak-admin";
import type { AuthService } from "./services/auth-service";
import type { InterviewService } from "./services/interview-service";
import { healthRouter, type HealthInfo } from "./routes/health";
import { authRouter } from "./routes/auth";
import { adminRouter } from "./routes/admin";
import { interviewsRouter } from "./routes/interviews";
import { errorHandler } from "./middleware/error-handler";

export interface AppDependencies {
	verifier: TokenVerifier;
	admin: KeycloakAdmin;
	authService: AuthService;
	/** Interview routes are mounted only when a LiveKit server is configured. */
	interviews?: InterviewService;
	logger: Logger;
	info: HealthInfo;
}

export function createApp(deps: AppDependencies): Express {
	const app = express();
	app.disable("x-powered-by");
	app.use(express.json());

	app.use(healthRouter({ ...deps.info, interviews: deps.interviews !== undefined }));
	app.use(authRouter(deps.verifier, deps.authService));
	app.use(adminRouter(deps.verifier, deps.admin));
	if (deps.interviews) app.use(interviewsRouter(deps.verifier, deps.interviews));

	app.use((_req, res) => res.status(404).json({ error: "not_found" }));
	app.use(errorHandler(deps.logger));
	return app;
}
