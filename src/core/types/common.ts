export type TraversalExtension = "none" | "typed-config" | "typed-config-and-engine";
export type SchemaCheckStatus = "up-to-date" | "out-of-date";
export type SchemaUpdateStatus = "unchanged" | "updated" | "created";
