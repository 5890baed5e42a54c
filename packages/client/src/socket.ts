/**
 * Transport seam for the remote-control channel
 */

import WebSocket from "ws";

export interface ChannelSocket {
	send(data: string): void;
	close(): void;
	onMessage(handler: (data: string) => void): void;
	onClose(handler: () => void): void;
}

export type SocketFactory = (url: string) => Promise<ChannelSocket>;

/**
 * Default factory backed by the `ws` package. Resolves once the socket is open.
 */
export function connectWebSocket(url: string): Promise<ChannelSocket> {
	return new Promise((resolve, reject) => {
		const ws = new WebSocket(url);

		ws.once("error", reject);
		ws.once("open", () => {
			ws.off("error", reject);
			// A close event always follows
			ws.on("error", (err) => {
				console.error("Channel socket error:", err.message);
			});
			resolve({
				send: (data) => ws.send(data),
				close: () => ws.close(),
				onMessage: (handler) => {
					ws.on("message", (data) => handler(decode(data)));
				},
				onClose: (handler) => {
					ws.on("close", () => handler());
				},
			});
		});
	});
}

function decode(data: WebSocket.RawData): string {
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString("utf-8");
	}
	if (data instanceof ArrayBuffer) {
		return Buffer.from(data).toString("utf-8");
	}
	return data.toString("utf-8");
}
