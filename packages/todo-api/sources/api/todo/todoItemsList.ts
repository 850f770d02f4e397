import type { TodoItemJson, TodoItemsFilter, TodoItemsStore } from "@/types";
import { todoItemJsonBuild } from "./todoItemJsonBuild.js";

export type TodoItemsListScope = "all" | "incomplete" | "completed";

export type TodoItemsListInput = {
    scope: TodoItemsListScope;
    todoItems: Pick<TodoItemsStore, "findMany">;
};

/**
 * Lists todo items, optionally narrowed to one completion state.
 */
export async function todoItemsList(input: TodoItemsListInput): Promise<TodoItemJson[]> {
    const records = await input.todoItems.findMany(todoItemsFilterBuild(input.scope));
    return records.map((record) => todoItemJsonBuild(record));
}

function todoItemsFilterBuild(scope: TodoItemsListScope): TodoItemsFilter {
    switch (scope) {
        case "all":
            return {};
        case "incomplete":
            return { isCompleted: false };
        case "completed":
            return { isCompleted: true };
    }
}
