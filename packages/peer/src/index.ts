export { LsnpPeer } from "./peer";
export type { LsnpPeerOptions } from "./peer";
export { AckRegistry, AckWaiter } from "./ack";
export { Outbox } from "./outbox";
export type { OutboxOptions, ReliableMessage } from "./outbox";
export { Router } from "./router";
export type { DropReason, Handler, RouteOutcome } from "./router";
export { GameSessionManager } from "./games";
export type { GameError, GameOpResult } from "./games";
export { FileTransferManager } from "./files";
export type { FileError, FileOpResult } from "./files";
export { PresenceService } from "./presence";
export { ChatService } from "./chat";
export type { DmResult } from "./chat";
export { PeerDirectory, RecordStore, gameKey } from "./state";
export type {
    GameKey,
    GameRecord,
    IncomingOffer,
    IncomingTransfer,
    OutgoingState,
    OutgoingTransfer,
    PeerProfile,
    PeerRecord,
    PendingInvite,
} from "./state";
export { DEFAULT_CONFIG, LSNP_PORT, createConfig, loadConfig } from "./config";
export type { PeerConfig } from "./config";
export { UdpTransport, detectLocalIp, subnetBroadcast } from "./transport";
export type { DatagramListener, Transport, UdpTransportOptions } from "./transport";
export { MemoryNetwork, MemoryTransport } from "./memory";
export type { Delivery, DropFilter } from "./memory";
export type {
    FileDoneEvent,
    FileOfferEvent,
    FileReceivedEvent,
    GameInviteEvent,
    GameMoveEvent,
    GameOverEvent,
    PeerContext,
    PeerEmit,
    PeerEvents,
} from "./context";
