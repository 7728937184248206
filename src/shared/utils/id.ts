import { randomUUID } from "node:crypto";

/** Random UUIDv4 for users, requests and audit entries */
export const generateId = (): string => randomUUID();
