import { AccessToken } from "livekit-server-sdk";
import { AuthError, AuthErrorKind, toInternalError } from "@resumeflow/shared/errors";
import type { VerifiedIdentity } from "@resumeflow/shared/types";
import type { Logger } from "@resumeflow/shared/utils";
import type { LiveKitConfig } from "../config";

export interface LiveKitRoom {
	name: string;
	numParticipants: number;
	/** Seconds since the epoch. */
	creationTime: bigint | number;
}

/** The part of livekit-server-sdk's `RoomServiceClient` used for interviews. */
export interface RoomClient {
	createRoom(options: { name: string }): Promise<LiveKitRoom>;
	listRooms(names?: string[]): Promise<LiveKitRoom[]>;
	deleteRoom(room: string): Promise<void>;
}

/** The part of livekit-server-sdk's `AgentDispatchClient` used for interviews. */
export interface AgentDispatcher {
	createDispatch(
		roomName: string,
		agentName: string,
		options?: { metadata?: string }
	): Promise<unknown>;
}

export interface InterviewRoom {
	roomName: string;
	participants: number;
	createdAt: Date;
}

export interface ProvisionedRoom extends InterviewRoom {
	token: string;
	websocketUrl: string;
}

export interface InterviewBrief {
	resume: string;
	jobDescription: string;
}

export interface Page {
	limit: number;
	offset: number;
}

export interface InterviewServiceOptions {
	config: LiveKitConfig;
	rooms: RoomClient;
	agents: AgentDispatcher;
	logger: Logger;
	now?: () => Date;
}

// 20261019_080503 in UTC
function roomStamp(date: Date): string {
	const iso = date.toISOString();
	return `${iso.slice(0, 10).replaceAll("-", "")}_${iso.slice(11, 19).replaceAll(":", "")}`;
}

function roomPrefix(identity: VerifiedIdentity): string {
	return `interview_${identity.sub}_`;
}

function toInterviewRoom(room: LiveKitRoom): InterviewRoom {
	return {
		roomName: room.name,
		participants: room.numParticipants,
		createdAt: new Date(Number(room.creationTime) * 1000),
	};
}

/**
 * Ephemeral audio/video interview rooms on LiveKit. A room belongs to the
 * user whose `sub` is embedded in its name; nothing is stored locally.
 */
export class InterviewService {
	private readonly logger: Logger;
	private readonly now: () => Date;

	constructor(private readonly options: InterviewServiceOptions) {
		this.logger = options.logger.child({ component: "InterviewService" });
		this.now = options.now ?? (() => new Date());
	}

	async createRoom(identity: VerifiedIdentity): Promise<ProvisionedRoom> {
		try {
			const createdAt = this.now();
			const requested = `${roomPrefix(identity)}${identity.username}_${roomStamp(createdAt)}`;
			const room = await this.options.rooms.createRoom({ name: requested });
			const token = await this.participantToken(room.name, identity);

			this.logger.info({ roomName: room.name, username: identity.username }, "Created interview room");
			return {
				roomName: room.name,
				participants: room.numParticipants,
				createdAt,
				token,
				websocketUrl: this.options.config.url,
			};
		} catch (err) {
			throw toInternalError(err, this.logger, "creating interview room");
		}
	}

	async listRooms(
		identity: VerifiedIdentity,
		page: Page
	): Promise<{ rooms: InterviewRoom[]; total: number }> {
		try {
			const prefix = roomPrefix(identity);
			const owned = (await this.options.rooms.listRooms())
				.filter((room) => room.name.startsWith(prefix))
				.map(toInterviewRoom)
				.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
			return {
				rooms: owned.slice(page.offset, page.offset + page.limit),
				total: owned.length,
			};
		} catch (err) {
			throw toInternalError(err, this.logger, "listing interview rooms");
		}
	}

	async getRoom(identity: VerifiedIdentity, roomName: string): Promise<InterviewRoom> {
		try {
			return toInterviewRoom(await this.findOwnedRoom(identity, roomName));
		} catch (err) {
			throw toInternalError(err, this.logger, "getting interview room");
		}
	}

	async endRoom(identity: VerifiedIdentity, roomName: string): Promise<void> {
		try {
			await this.findOwnedRoom(identity, roomName);
			await this.options.rooms.deleteRoom(roomName);
			this.logger.info({ roomName }, "Ended interview room");
		} catch (err) {
			throw toInternalError(err, this.logger, "ending interview room");
		}
	}

	/**
	 * Dispatches the interviewer agent into the caller's room. The resume and
	 * job description travel as the dispatch metadata.
	 */
	async startInterviewer(
		identity: VerifiedIdentity,
		roomName: string,
		brief: InterviewBrief
	): Promise<void> {
		try {
			await this.findOwnedRoom(identity, roomName);
			const { agentName } = this.options.config;
			await this.options.agents.createDispatch(roomName, agentName, {
				metadata: JSON.stringify({
					resume: brief.resume,
					job_description: brief.jobDescription,
				}),
			});
			this.logger.info({ roomName, agentName }, "Started AI interviewer");
		} catch (err) {
			throw toInternalError(err, this.logger, "starting interviewer");
		}
	}

	// Rooms of other users are reported as missing.
	private async findOwnedRoom(identity: VerifiedIdentity, roomName: string): Promise<LiveKitRoom> {
		const room = roomName.startsWith(roomPrefix(identity))
			? (await this.options.rooms.listRooms([roomName])).find((r) => r.name === roomName)
			: undefined;
		if (!room) {
			throw new AuthError(
				AuthErrorKind.ResourceNotFound,
				`Interview room with id ${roomName} not found`
			);
		}
		return room;
	}

	private async participantToken(roomName: string, identity: VerifiedIdentity): Promise<string> {
		const { apiKey, apiSecret } = this.options.config;
		const token = new AccessToken(apiKey, apiSecret, {
			identity: identity.sub,
			name: identity.username,
		});
		token.addGrant({ roomJoin: true, room: roomName, canPublish: true, canSubscribe: true });
		return token.toJwt();
	}
}
