import type { TodoItemChange, TodoItemDbRecord, TodoItemsFilter } from "../../storage/databaseTypes.js";
import type { TodoItemsCommitResult } from "../../storage/todoItemsRepository.js";

export type TodoItemJson = {
    id: number;
    title: string | null;
    description: string | null;
    dueDate: string;
    completedDate: string | null;
    isCompleted: boolean;
};

/**
 * Persistence surface the handlers depend on; TodoItemsRepository satisfies it.
 */
export type TodoItemsStore = {
    findMany: (filter?: TodoItemsFilter) => Promise<TodoItemDbRecord[]>;
    findById: (id: number) => Promise<TodoItemDbRecord | null>;
    exists: (id: number) => Promise<boolean>;
    commit: (changes: TodoItemChange[]) => Promise<TodoItemsCommitResult>;
};

export type TodoPayloadIssues = {
    formErrors: string[];
    fieldErrors: Partial<Record<string, string[]>>;
};

export type TodoRequestFailure =
    | {
          ok: false;
          kind: "invalid";
          message: string | null;
          details?: TodoPayloadIssues;
      }
    | {
          ok: false;
          kind: "not_found";
      };
