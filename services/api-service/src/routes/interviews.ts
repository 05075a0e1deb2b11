import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import type { TokenVerifier } from "../keycloak/token-verifier";
import type { InterviewRoom, InterviewService } from "../services/interview-service";
import { authenticate, currentIdentity } from "../middleware/auth";

const startSchema = z.object({
	resume: z.string().min(1),
	job_description: z.string().min(1),
});

const legacyStartSchema = startSchema.extend({ room_name: z.string().min(1) });

const pageSchema = z.object({
	limit: z.coerce.number().int().min(1).max(100).default(10),
	offset: z.coerce.number().int().min(0).default(0),
});

function roomBody(room: InterviewRoom) {
	return {
		id: room.roomName,
		room_name: room.roomName,
		num_participants: room.participants,
		created_at: room.createdAt.toISOString(),
	};
}

function deprecated(successor: string) {
	return (_req: Request, res: Response, next: NextFunction) => {
		res.setHeader("Deprecation", "true");
		res.setHeader("Link", `<${successor}>; rel="successor-version"`);
		next();
	};
}

export function interviewsRouter(verifier: TokenVerifier, interviews: InterviewService): Router {
	const router = Router();
	router.use("/interviews", authenticate(verifier));

	const createRoom = async (req: Request, res: Response, next: NextFunction) => {
		try {
			const room = await interviews.createRoom(currentIdentity(req));
			return res.status(201).json({
				id: room.roomName,
				room_name: room.roomName,
				token: room.token,
				websocket_url: room.websocketUrl,
				status: "active",
				created_at: room.createdAt.toISOString(),
			});
		} catch (err) {
			return next(err);
		}
	};

	router.post("/interviews/rooms", createRoom);

	router.get("/interviews/rooms", async (req, res, next) => {
		const page = pageSchema.safeParse(req.query);
		if (!page.success) return res.status(400).json({ error: "invalid_pagination" });
		try {
			const { rooms, total } = await interviews.listRooms(currentIdentity(req), page.data);
			return res.json({ data: rooms.map(roomBody), total, ...page.data });
		} catch (err) {
			return next(err);
		}
	});

	router.get("/interviews/rooms/:roomId", async (req, res, next) => {
		try {
			return res.json(roomBody(await interviews.getRoom(currentIdentity(req), req.params.roomId)));
		} catch (err) {
			return next(err);
		}
	});

	router.delete("/interviews/rooms/:roomId", async (req, res, next) => {
		try {
			await interviews.endRoom(currentIdentity(req), req.params.roomId);
			return res.status(204).end();
		} catch (err) {
			return next(err);
		}
	});

	router.post("/interviews/rooms/:roomId/start", async (req, res, next) => {
		const parsed = startSchema.safeParse(req.body ?? {});
		if (!parsed.success) return res.status(400).json({ error: "missing_required_fields" });
		const roomName = req.params.roomId;
		try {
			await interviews.startInterviewer(currentIdentity(req), roomName, {
				resume: parsed.data.resume,
				jobDescription: parsed.data.job_description,
			});
			return res.json({
				message: `AI interviewer started in room ${roomName}.`,
				room_id: roomName,
				room_name: roomName,
			});
		} catch (err) {
			return next(err);
		}
	});

	// Deprecated aliases kept for older clients.
	router.post("/interviews/start-room", deprecated("/interviews/rooms"), createRoom);

	router.post(
		"/interviews/start-interviewer",
		deprecated("/interviews/rooms/:roomId/start"),
		async (req, res, next) => {
			const parsed = legacyStartSchema.safeParse(req.body ?? {});
			if (!parsed.success) return res.status(400).json({ error: "missing_required_fields" });
			const { room_name: roomName, resume, job_description: jobDescription } = parsed.data;
			try {
				await interviews.startInterviewer(currentIdentity(req), roomName, {
					resume,
					jobDescription,
				});
				return res.json({
					message: `AI interviewer started in room ${roomName}.`,
					room_id: roomName,
					room_name: roomName,
				});
			} catch (err) {
				return next(err);
			}
		}
	);

	return router;
}
