import { EventEmitter } from "node:events";
import { existsSync, unlinkSync } from "node:fs";
import {
	createConnection,
	createServer,
	type Server,
	type Socket,
} from "node:net";
import type {
	DaemonStatus,
	DisplaySnapshot,
	IPCMessage,
	OverlaySettings,
} from "../shared/ipc-types";
import { logger } from "../utils/logger";
import { runtimePaths } from "./runtime";

export const IPC_PROTOCOL_VERSION = 1;
export const DEFAULT_SOCKET_PATH = runtimePaths().socketFile;

const STALE_CHECK_MS = 1000;

export interface IPCServerEvents {
	clientConnected: (clientId: number) => void;
	clientDisconnected: (clientId: number) => void;
	error: (error: Error) => void;
}

/**
 * Newline-delimited JSON over a Unix socket. An external overlay connects,
 * receives a `hello` with the current state, then a `state` per change.
 */
export class IPCServer extends EventEmitter {
	private server: Server | null = null;
	private clients: Map<number, Socket> = new Map();
	private clientIdCounter = 0;
	private status: DaemonStatus = "idle";
	private display: DisplaySnapshot = { state: "hidden", label: "" };

	constructor(
		private readonly ui: OverlaySettings,
		public readonly socketPath: string = DEFAULT_SOCKET_PATH,
	) {
		super();
	}

	get clientCount(): number {
		return this.clients.size;
	}

	/** Resolves true when a leftover socket file had no listener and was removed. */
	private async checkAndCleanStaleSocket(): Promise<boolean> {
		if (!existsSync(this.socketPath)) {
			return false;
		}

		return new Promise((resolve) => {
			const check = createConnection({ path: this.socketPath });
			const timeout = setTimeout(() => {
				check.destroy();
				this.cleanupSocketFile();
				resolve(true);
			}, STALE_CHECK_MS);

			check.on("connect", () => {
				clearTimeout(timeout);
				check.destroy();
				resolve(false);
			});

			check.on("error", () => {
				clearTimeout(timeout);
				check.destroy();
				this.cleanupSocketFile();
				resolve(true);
			});
		});
	}

	private cleanupSocketFile(): void {
		try {
			if (existsSync(this.socketPath)) {
				unlinkSync(this.socketPath);
				logger.debug({ path: this.socketPath }, "Cleaned up socket file");
			}
		} catch (err) {
			logger.warn({ err, path: this.socketPath }, "Failed to cleanup socket file");
		}
	}

	async start(): Promise<void> {
		const wasStale = await this.checkAndCleanStaleSocket();

		if (existsSync(this.socketPath) && !wasStale) {
			throw new Error("Another daemon instance is already running");
		}

		return new Promise((resolve, reject) => {
			const server = createServer((socket) => {
				this.handleClientConnection(socket);
			});
			this.server = server;

			server.on("error", (err: NodeJS.ErrnoException) => {
				if (err.code === "EADDRINUSE") {
					reject(new Error("Socket address already in use"));
				} else {
					if (this.listenerCount("error") > 0) this.emit("error", err);
					reject(err);
				}
			});

			server.listen(this.socketPath, () => {
				logger.info({ path: this.socketPath }, "IPC server started");
				resolve();
			});
		});
	}

	async stop(): Promise<void> {
		for (const [clientId, socket] of this.clients) {
			socket.destroy();
			logger.debug({ clientId }, "Closed client connection");
		}
		this.clients.clear();

		const server = this.server;
		if (!server) return;
		this.server = null;

		return new Promise((resolve) => {
			server.close(() => {
				this.cleanupSocketFile();
				logger.info("IPC server stopped");
				resolve();
			});
		});
	}

	private handleClientConnection(socket: Socket): void {
		const clientId = ++this.clientIdCounter;
		this.clients.set(clientId, socket);

		logger.debug({ clientId }, "IPC client connected");
		this.emit("clientConnected", clientId);

		this.sendToClient(clientId, {
			type: "hello",
			version: IPC_PROTOCOL_VERSION,
			status: this.status,
			display: this.display,
			ui: this.ui,
		});

		// Clients only listen; anything they send is logged and dropped.
		socket.on("data", (data) => {
			const lines = data
				.toString()
				.split("\n")
				.filter((l) => l.trim());
			for (const line of lines) {
				try {
					logger.debug({ clientId, msg: JSON.parse(line) }, "Received message from client");
				} catch {
					logger.debug({ clientId, line }, "Ignored malformed client message");
				}
			}
		});

		socket.on("close", () => {
			this.clients.delete(clientId);
			logger.debug({ clientId }, "IPC client disconnected");
			this.emit("clientDisconnected", clientId);
		});

		socket.on("error", (err) => {
			logger.warn({ clientId, err }, "IPC client error");
			this.clients.delete(clientId);
		});
	}

	private sendToClient(clientId: number, message: IPCMessage): boolean {
		const socket = this.clients.get(clientId);
		if (!socket || socket.destroyed) {
			this.clients.delete(clientId);
			return false;
		}

		try {
			socket.write(`${JSON.stringify(message)}\n`);
			return true;
		} catch (err) {
			logger.warn({ clientId, err }, "Failed to send message to client");
			this.clients.delete(clientId);
			return false;
		}
	}

	broadcast(status: DaemonStatus, display: DisplaySnapshot): void {
		this.status = status;
		this.display = display;

		let successCount = 0;
		for (const clientId of [...this.clients.keys()]) {
			if (this.sendToClient(clientId, { type: "state", status, display })) {
				successCount++;
			}
		}

		if (this.clients.size > 0) {
			logger.debug(
				{ status, display: display.state, clients: successCount },
				"Broadcast state to clients",
			);
		}
	}
}
