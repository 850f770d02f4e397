export type TodoItemDbRecord = {
    id: number;
    title: string | null;
    description: string | null;
    dueDate: Date;
    completedDate: Date | null;
    isCompleted: boolean;
};

export type TodoItemCreateInput = Omit<TodoItemDbRecord, "id">;

export type TodoItemsFilter = {
    isCompleted?: boolean;
};

/**
 * One staged write. Nothing reaches the store until the batch is committed.
 * `replace` overwrites every mutable column of the row with the given state.
 */
export type TodoItemChange =
    | { kind: "insert"; item: TodoItemCreateInput }
    | { kind: "replace"; item: TodoItemDbRecord }
    | { kind: "remove"; id: number };
