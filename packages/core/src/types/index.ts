export type {
  TransferItem,
  QueueGetResult,
  UploadStatsSnapshot,
  PushKind,
  PushResult,
  PushOutcome,
} from './transfer.js';

export type {
  RemoteHost,
  GitRunner,
  ArchiveService,
  GitIdentity,
} from './collaborators.js';
