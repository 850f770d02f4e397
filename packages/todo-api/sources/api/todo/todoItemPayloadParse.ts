import { z } from "zod";

import { TODO_ITEM_ID_MAX } from "../../schema.js";
import { todoDateNormalize } from "./todoDateNormalize.js";
import type { TodoRequestFailure } from "./todoTypes.js";

export type TodoItemPayload = {
    id: number | null;
    title: string | null;
    description: string | null;
    dueDate: Date;
    completedDate: Date | null;
    isCompleted: boolean;
};

const todoDateSchema = z.string().transform((value, context) => {
    const date = todoDateNormalize(value);
    if (!date) {
        context.addIssue({
            code: z.ZodIssueCode.custom,
            message: "must be an ISO-8601 timestamp"
        });
        return z.NEVER;
    }
    return date;
});

const todoItemFieldsSchema = z.object({
    title: z.string().nullish(),
    description: z.string().nullish(),
    dueDate: todoDateSchema,
    completedDate: todoDateSchema.nullish(),
    isCompleted: z.boolean().optional()
});

// Only update reads the body id; create drops it with the other unknown keys.
const todoItemUpdateSchema = todoItemFieldsSchema.extend({
    id: z.number().int().nullish()
});

export type TodoItemPayloadMode = "create" | "update";

type TodoItemPayloadParseResult = { ok: true; payload: TodoItemPayload } | TodoRequestFailure;

/**
 * Validates the JSON shape of a TodoItem body. Business rules are checked by the handlers.
 * Expects: body is the parsed request body (any JSON value).
 */
export function todoItemPayloadParse(body: unknown, mode: TodoItemPayloadMode): TodoItemPayloadParseResult {
    if (mode === "create") {
        const result = todoItemFieldsSchema.safeParse(body);
        return result.success
            ? { ok: true, payload: todoItemPayloadBuild(result.data, null) }
            : payloadInvalid(result.error);
    }
    const result = todoItemUpdateSchema.safeParse(body);
    return result.success
        ? { ok: true, payload: todoItemPayloadBuild(result.data, result.data.id ?? null) }
        : payloadInvalid(result.error);
}

/**
 * Parses a route id segment into an integer, or null when it is not one.
 */
export function todoItemIdParse(value: string | undefined): number | null {
    if (!value || !/^-?\d+$/.test(value)) {
        return null;
    }
    const id = Number(value);
    return Number.isSafeInteger(id) ? id : null;
}

/**
 * True when the id fits the serial column. Any other id cannot name a stored item.
 */
export function todoItemIdStorable(id: number): boolean {
    return id >= 1 && id <= TODO_ITEM_ID_MAX;
}

function todoItemPayloadBuild(data: z.infer<typeof todoItemFieldsSchema>, id: number | null): TodoItemPayload {
    return {
        id,
        title: data.title ?? null,
        description: data.description ?? null,
        dueDate: data.dueDate,
        completedDate: data.completedDate ?? null,
        isCompleted: data.isCompleted ?? false
    };
}

function payloadInvalid(error: z.ZodError): TodoRequestFailure {
    return {
        ok: false,
        kind: "invalid",
        message: "Invalid payload",
        details: error.flatten()
    };
}
