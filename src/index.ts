export { Handle } from "./util/list";
export type { List } from "./util/list";
export { SinglyLinkedList } from "./util/singly-linked-list";
export { DoublyLinkedList } from "./util/doubly-linked-list";
export { ListOperationError, isListOperationError, unwrap } from "./util/list-errors";
export type { ListOperationErrorKind, Result, Ok, Err } from "./util/list-errors";
export { initializeLogging, getLogger, resetLogging } from "./logging/logging";
export * from "./logging/log-levels";
export { DEFAULT_CONFIG, loadConfig, loadConfigFile } from "./config/list-config";
export type { ListConfig, LoggingConfig, Environment } from "./config/list-config";
