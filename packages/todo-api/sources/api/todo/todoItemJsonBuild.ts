import type { TodoItemDbRecord, TodoItemJson } from "@/types";

/**
 * Shapes a stored record into its wire form. Timestamps are emitted in UTC.
 */
export function todoItemJsonBuild(record: TodoItemDbRecord): TodoItemJson {
    return {
        id: record.id,
        title: record.title,
        description: record.description,
        dueDate: record.dueDate.toISOString(),
        completedDate: record.completedDate ? record.completedDate.toISOString() : null,
        isCompleted: record.isCompleted
    };
}
