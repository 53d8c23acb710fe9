export { BackgroundReconciler } from './background-reconciler';
export type { ReconcilerConfig } from './background-reconciler';
export { DispatchCoordinator, PENDING_PLACEHOLDER } from './dispatch-coordinator';
export type { DispatchConfig, StreamListener } from './dispatch-coordinator';
export { Gateway } from './gateway';
export type { GatewayConfig, GatewaySnapshot, UnregisterOutcome } from './gateway';
export { QueryService } from './query.service';
export { Reaper } from './reaper';
export { A2AHttpInvoker, settle } from './remote-invoker';
export type { AgentCardResolver, RemoteInvoker, RemoteOutcome } from './remote-invoker';
export { classifyReply, classifyStreamEvent, patchFromReply, patchFromStreamEvent } from './reply-classifier';
export type { ReplyClassification, StreamEventClassification } from './reply-classifier';
export { SnapshotService } from './snapshot.service';
