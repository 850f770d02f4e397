import type { TodoDbTransaction } from "../../schema.js";

export type Migration = {
    name: string;
    up: (tx: TodoDbTransaction) => Promise<void>;
};
