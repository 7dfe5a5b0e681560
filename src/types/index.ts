export {
  SERVICE_STATUSES,
  STATUS_ORDINAL,
  isServiceStatus,
  createSnapshot,
  type ServiceStatus,
  type Snapshot,
} from "./snapshot.ts";

export {
  CHANGE_KINDS,
  isChangeKind,
  type ChangeKind,
  type ChangeEvent,
} from "./events.ts";
