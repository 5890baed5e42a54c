/**
 * Client for a deskrelay server
 */

import { z } from "zod";
import {
	ENDPOINTS,
	ServerEventSchema,
	SessionCreateResponseSchema,
	SessionSnapshotSchema,
	type ClickKind,
	type ClientMessageInput,
	type KeyActionKind,
	type PartyRole,
	type PointerButton,
	type ServerEvent,
	type ServerEventType,
	type SessionCreateRequest,
	type SessionCreateResponse,
	type SessionSnapshot,
} from "@deskrelay/shared";
import { connectWebSocket, type ChannelSocket, type SocketFactory } from "./socket.js";

const CloseResponseSchema = z.object({ closed: z.boolean() });
const ActiveSessionsSchema = z.object({ sessions: z.array(SessionSnapshotSchema) });

export type ServerEventOf<T extends ServerEventType> = Extract<ServerEvent, { type: T }>;

export interface RemoteControlClientOptions {
	/** Staff bearer token, required for the HTTP API */
	staffToken?: string;
	socketFactory?: SocketFactory;
	fetch?: typeof fetch;
}

export class RemoteControlApiError extends Error {
	constructor(
		message: string,
		public readonly status: number,
	) {
		super(message);
		this.name = "RemoteControlApiError";
	}
}

/**
 * RemoteControlClient - staff HTTP calls plus one channel connection
 */
export class RemoteControlClient {
	private socket: ChannelSocket | null = null;
	private handlers = new Map<ServerEventType, Set<(event: ServerEvent) => void>>();
	private closeHandlers = new Set<() => void>();
	private readonly socketFactory: SocketFactory;
	private readonly fetchFn: typeof fetch;

	constructor(
		private serverUrl: string,
		private options: RemoteControlClientOptions = {},
	) {
		this.socketFactory = options.socketFactory ?? connectWebSocket;
		this.fetchFn = options.fetch ?? fetch;
	}

	get connected(): boolean {
		return this.socket !== null;
	}

	async createSession(request: SessionCreateRequest): Promise<SessionCreateResponse> {
		return this.request("POST", ENDPOINTS.SESSIONS, SessionCreateResponseSchema, request);
	}

	async getSession(sessionId: string): Promise<SessionSnapshot> {
		return this.request(
			"GET",
			`${ENDPOINTS.SESSIONS}/${encodeURIComponent(sessionId)}`,
			SessionSnapshotSchema,
		);
	}

	async closeSession(sessionId: string): Promise<void> {
		await this.request(
			"POST",
			`${ENDPOINTS.SESSIONS}/${encodeURIComponent(sessionId)}/close`,
			CloseResponseSchema,
		);
	}

	async listActiveSessions(): Promise<SessionSnapshot[]> {
		const { sessions } = await this.request("GET", ENDPOINTS.ACTIVE_SESSIONS, ActiveSessionsSchema);
		return sessions;
	}

	/**
	 * Open the channel. Calling it again while connected is a no-op.
	 */
	async connect(): Promise<void> {
		if (this.socket) return;

		const url = new URL(ENDPOINTS.CHANNEL, this.serverUrl);
		url.protocol = url.protocol === "https:" ? "wss:" : "ws:";

		const socket = await this.socketFactory(url.toString());
		socket.onMessage((data) => this.handleMessage(data));
		socket.onClose(() => {
			if (this.socket === socket) {
				this.socket = null;
			}
			for (const handler of this.closeHandlers) {
				handler();
			}
		});
		this.socket = socket;
	}

	join(sessionId: string, role: PartyRole, token: string): void {
		this.send({ type: "join_session", sessionId, role, token });
	}

	leave(): void {
		this.send({ type: "leave_session" });
	}

	activate(): void {
		this.send({ type: "activate" });
	}

	requestFrame(): void {
		this.send({ type: "request_frame" });
	}

	pointerMove(x: number, y: number, sourceWidth: number, sourceHeight: number): void {
		this.send({ type: "pointer_move", x, y, sourceWidth, sourceHeight });
	}

	pointerButton(
		x: number,
		y: number,
		sourceWidth: number,
		sourceHeight: number,
		button: PointerButton = "left",
		kind: ClickKind = "single",
	): void {
		this.send({ type: "pointer_button", x, y, sourceWidth, sourceHeight, button, kind });
	}

	pointerScroll(x: number, y: number, sourceWidth: number, sourceHeight: number, delta: number): void {
		this.send({ type: "pointer_scroll", x, y, sourceWidth, sourceHeight, delta });
	}

	key(key: string, action: KeyActionKind = "press"): void {
		this.send({ type: "key", key, action });
	}

	keyCombination(keys: string[]): void {
		this.send({ type: "key_combination", keys });
	}

	typeText(text: string): void {
		this.send({ type: "text_input", text });
	}

	/**
	 * Register a handler for one server event type
	 * @returns a function that removes the handler
	 */
	on<T extends ServerEventType>(type: T, handler: (event: ServerEventOf<T>) => void): () => void {
		const wrapped = (event: ServerEvent) => {
			if (isEventOfType(event, type)) {
				handler(event);
			}
		};

		const set = this.handlers.get(type) ?? new Set<(event: ServerEvent) => void>();
		this.handlers.set(type, set);
		set.add(wrapped);

		return () => {
			set.delete(wrapped);
		};
	}

	onClose(handler: () => void): () => void {
		this.closeHandlers.add(handler);
		return () => {
			this.closeHandlers.delete(handler);
		};
	}

	/**
	 * Close the channel and drop every handler
	 */
	disconnect(): void {
		if (this.socket) {
			this.socket.close();
			this.socket = null;
		}

		this.handlers.clear();
		this.closeHandlers.clear();
	}

	private send(message: ClientMessageInput): void {
		if (!this.socket) {
			throw new Error("Not connected to server");
		}
		this.socket.send(JSON.stringify(message));
	}

	private handleMessage(data: string): void {
		let payload: unknown;
		try {
			payload = JSON.parse(data);
		} catch (err) {
			console.error("Failed to parse channel message:", err);
			return;
		}

		const parsed = ServerEventSchema.safeParse(payload);
		if (!parsed.success) {
			console.error("Unexpected channel message:", parsed.error.message);
			return;
		}

		const event = parsed.data;
		for (const handler of this.handlers.get(event.type) ?? []) {
			handler(event);
		}
	}

	private async request<T>(
		method: string,
		path: string,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		body?: unknown,
	): Promise<T> {
		if (!this.options.staffToken) {
			throw new Error("A staff token is required for this call");
		}

		const response = await this.fetchFn(new URL(path, this.serverUrl), {
			method,
			headers: {
				Authorization: `Bearer ${this.options.staffToken}`,
				...(body === undefined ? {} : { "Content-Type": "application/json" }),
			},
			body: body === undefined ? undefined : JSON.stringify(body),
		});

		let payload: unknown;
		try {
			payload = await response.json();
		} catch {
			payload = undefined;
		}
		if (!response.ok) {
			throw new RemoteControlApiError(errorMessage(payload, response.statusText), response.status);
		}
		const parsed = schema.safeParse(payload);
		if (!parsed.success) {
			throw new RemoteControlApiError(`Unexpected response from ${path}`, response.status);
		}
		return parsed.data;
	}
}

function isEventOfType<T extends ServerEventType>(event: ServerEvent, type: T): event is ServerEventOf<T> {
	return event.type === type;
}

function errorMessage(payload: unknown, fallback: string): string {
	if (typeof payload === "object" && payload !== null && "error" in payload && typeof payload.error === "string") {
		return payload.error;
	}
	return fallback;
}
