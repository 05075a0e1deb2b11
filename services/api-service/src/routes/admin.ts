import { Router } from "express";
import { z } from "zod";
import type { TokenVerifier } from "../keycloak/token-verifier";
import type { KeycloakAdmin } from "../keycloak/keycloak-admin";
import { authenticate, requestSignal } from "../middleware/auth";

const ADMIN_ROLES = ["admin"];

const updateUserSchema = z
	.object({
		firstName: z.string().min(1).optional(),
		lastName: z.string().min(1).optional(),
		email: z.string().email().optional(),
		phoneNumber: z.string().min(1).optional(),
	})
	.strict();

const assignRoleSchema = z.object({
	roleName: z.string().min(1),
	// The client's internal id in Keycloak, not its clientId.
	clientUuid: z.string().min(1).optional(),
});

export function adminRouter(verifier: TokenVerifier, admin: KeycloakAdmin): Router {
	const router = Router();
	router.use("/admin", authenticate(verifier, ...ADMIN_ROLES));

	router.get("/admin/users/:userId", async (req, res, next) => {
		try {
			const user = await admin.getUserInfo(req.params.userId, {
				signal: requestSignal(req, res),
			});
			return res.json(user);
		} catch (err) {
			return next(err);
		}
	});

	router.patch("/admin/users/:userId", async (req, res, next) => {
		const parsed = updateUserSchema.safeParse(req.body ?? {});
		if (!parsed.success) {
			return res.status(400).json({
				error: "invalid_update",
				issues: parsed.error.issues.map((issue) => ({
					path: issue.path.join("."),
					message: issue.message,
				})),
			});
		}
		try {
			await admin.updateUserInfo(req.params.userId, parsed.data, {
				signal: requestSignal(req, res),
			});
			return res.json({ success: true });
		} catch (err) {
			return next(err);
		}
	});

	router.post("/admin/users/:userId/roles", async (req, res, next) => {
		const parsed = assignRoleSchema.safeParse(req.body ?? {});
		if (!parsed.success) {
			return res.status(400).json({ error: "missing_required_fields" });
		}
		const { roleName, clientUuid } = parsed.data;
		try {
			await admin.assignRoleToUser(req.params.userId, roleName, clientUuid, {
				signal: requestSignal(req, res),
			});
			return res.status(201).json({ success: true, roleName });
		} catch (err) {
			return next(err);
		}
	});

	router.delete("/admin/users/:userId/roles/:roleName", async (req, res, next) => {
		const clientUuid =
			typeof req.query.clientUuid === "string" ? req.query.clientUuid : undefined;
		try {
			await admin.revokeRoleFromUser(req.params.userId, req.params.roleName, clientUuid, {
				signal: requestSignal(req, res),
			});
			return res.json({ success: true, roleName: req.params.roleName });
		} catch (err) {
			return next(err);
		}
	});

	return router;
}
