import { TODO_DESCRIPTION_MAX_LENGTH } from "../../schema.js";
import { todoItemJsonBuild } from "./todoItemJsonBuild.js";
import { todoItemPayloadParse } from "./todoItemPayloadParse.js";
import type { TodoItemJson, TodoItemsStore, TodoRequestFailure } from "./todoTypes.js";

export const TODO_DUE_DATE_PAST_MESSAGE = "due date is in the past";

export type TodoItemsCreateInput = {
    body: unknown;
    now: () => Date;
    todoItems: Pick<TodoItemsStore, "commit">;
};

export type TodoItemsCreateResult = { ok: true; item: TodoItemJson } | TodoRequestFailure;

/**
 * Validates a new todo item and persists it. Any client-supplied id is ignored.
 * Expects: description is at most 100 characters; dueDate is not before now.
 */
export async function todoItemsCreate(input: TodoItemsCreateInput): Promise<TodoItemsCreateResult> {
    const parsed = todoItemPayloadParse(input.body, "create");
    if (!parsed.ok) {
        return parsed;
    }
    const payload = parsed.payload;

    if (payload.description !== null && payload.description.length > TODO_DESCRIPTION_MAX_LENGTH) {
        return { ok: false, kind: "invalid", message: null };
    }
    if (payload.dueDate.getTime() < input.now().getTime()) {
        return { ok: false, kind: "invalid", message: TODO_DUE_DATE_PAST_MESSAGE };
    }

    const result = await input.todoItems.commit([
        {
            kind: "insert",
            item: {
                title: payload.title,
                description: payload.description,
                dueDate: payload.dueDate,
                completedDate: payload.completedDate,
                isCompleted: payload.isCompleted
            }
        }
    ]);
    const created = result.inserted[0];
    if (!created) {
        throw new Error("Todo item insert returned no row.");
    }
    return { ok: true, item: todoItemJsonBuild(created) };
}
