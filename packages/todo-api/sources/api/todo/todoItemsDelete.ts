import { storageErrorIs } from "../../storage/storageError.js";
import { todoItemIdParse, todoItemIdStorable } from "./todoItemPayloadParse.js";
import type { TodoItemsStore, TodoRequestFailure } from "./todoTypes.js";

export type TodoItemsDeleteInput = {
    id: string | undefined;
    todoItems: Pick<TodoItemsStore, "findById" | "commit">;
};

export type TodoItemsDeleteResult = { ok: true; id: number } | TodoRequestFailure;

/**
 * Physically deletes one todo item. Deleting an absent item is not-found, not a no-op.
 */
export async function todoItemsDelete(input: TodoItemsDeleteInput): Promise<TodoItemsDeleteResult> {
    const id = todoItemIdParse(input.id);
    if (id === null || !todoItemIdStorable(id)) {
        return { ok: false, kind: "not_found" };
    }

    const existing = await input.todoItems.findById(id);
    if (!existing) {
        return { ok: false, kind: "not_found" };
    }

    try {
        await input.todoItems.commit([{ kind: "remove", id: existing.id }]);
    } catch (error) {
        // Removed by a concurrent request between the lookup and the commit.
        if (storageErrorIs(error, "conflict")) {
            return { ok: false, kind: "not_found" };
        }
        throw error;
    }

    return { ok: true, id };
}
