export type ConnectionStateValue = "OPEN" | "CONFIGURED" | "STREAMING" | "CLOSED";
