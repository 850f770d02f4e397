import { TODO_DESCRIPTION_MAX_LENGTH } from "../../schema.js";
import { storageErrorIs } from "../../storage/storageError.js";
import { todoItemIdParse, todoItemIdStorable, todoItemPayloadParse } from "./todoItemPayloadParse.js";
import type { TodoItemsStore, TodoRequestFailure } from "./todoTypes.js";

export type TodoItemsUpdateInput = {
    id: string | undefined;
    body: unknown;
    now: () => Date;
    todoItems: Pick<TodoItemsStore, "commit" | "exists">;
};

export type TodoItemsUpdateResult = { ok: true; id: number } | TodoRequestFailure;

/**
 * Replaces a todo item with the full state sent by the client, without reading it first.
 * A completed item without completedDate is stamped with the current time.
 * Expects: body.id equals the route id.
 */
export async function todoItemsUpdate(input: TodoItemsUpdateInput): Promise<TodoItemsUpdateResult> {
    const id = todoItemIdParse(input.id);
    if (id === null) {
        return { ok: false, kind: "invalid", message: null };
    }
    const parsed = todoItemPayloadParse(input.body, "update");
    if (!parsed.ok) {
        return parsed;
    }
    const payload = parsed.payload;

    if (payload.id !== id) {
        return { ok: false, kind: "invalid", message: null };
    }
    if (payload.description !== null && payload.description.length > TODO_DESCRIPTION_MAX_LENGTH) {
        return { ok: false, kind: "invalid", message: null };
    }
    if (!todoItemIdStorable(id)) {
        return { ok: false, kind: "not_found" };
    }

    const completedDate = payload.isCompleted && payload.completedDate === null ? input.now() : payload.completedDate;

    try {
        await input.todoItems.commit([
            {
                kind: "replace",
                item: {
                    id,
                    title: payload.title,
                    description: payload.description,
                    dueDate: payload.dueDate,
                    completedDate,
                    isCompleted: payload.isCompleted
                }
            }
        ]);
    } catch (error) {
        if (storageErrorIs(error, "conflict") && !(await input.todoItems.exists(id))) {
            return { ok: false, kind: "not_found" };
        }
        throw error;
    }

    return { ok: true, id };
}
