export {
	RemoteControlClient,
	RemoteControlApiError,
	type RemoteControlClientOptions,
	type ServerEventOf,
} from "./client.js";
export { connectWebSocket, type ChannelSocket, type SocketFactory } from "./socket.js";
