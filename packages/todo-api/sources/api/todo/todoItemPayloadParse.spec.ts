import { describe, expect, it } from "vitest";

import { todoItemIdParse, todoItemIdStorable, todoItemPayloadParse } from "./todoItemPayloadParse.js";

describe("todoItemPayloadParse", () => {
    it("fills absent optional fields", () => {
        const result = todoItemPayloadParse({ dueDate: "2026-10-19T00:00:00Z" }, "create");

        expect(result).toEqual({
            ok: true,
            payload: {
                id: null,
                title: null,
                description: null,
                dueDate: new Date("2026-10-19T00:00:00.000Z"),
                completedDate: null,
                isCompleted: false
            }
        });
    });

    it("keeps explicit values", () => {
        const body = {
            id: 5,
            title: "Groceries",
            description: "buy milk",
            dueDate: "2026-10-19T00:00:00Z",
            completedDate: "2026-10-18T10:00:00Z",
            isCompleted: true
        };

        const result = todoItemPayloadParse(body, "update");

        expect(result).toEqual({
            ok: true,
            payload: {
                id: 5,
                title: "Groceries",
                description: "buy milk",
                dueDate: new Date("2026-10-19T00:00:00.000Z"),
                completedDate: new Date("2026-10-18T10:00:00.000Z"),
                isCompleted: true
            }
        });
    });

    it("reports field type errors", () => {
        const result = todoItemPayloadParse({ id: 1.5, title: 5, dueDate: "2026-10-19T00:00:00Z" }, "update");

        expect(result).toEqual({
            ok: false,
            kind: "invalid",
            message: "Invalid payload",
            details: {
                formErrors: [],
                fieldErrors: {
                    id: ["Expected integer, received float"],
                    title: ["Expected string, received number"]
                }
            }
        });
    });

    it("rejects a body that is not an object", () => {
        const result = todoItemPayloadParse(null, "create");

        expect(result).toEqual({
            ok: false,
            kind: "invalid",
            message: "Invalid payload",
            details: { formErrors: ["Expected object, received null"], fieldErrors: {} }
        });
    });

    it("drops a client id of any type on create", () => {
        const result = todoItemPayloadParse({ id: "x", dueDate: "2026-10-19T00:00:00Z" }, "create");

        expect(result).toMatchObject({ ok: true, payload: { id: null } });
    });

    it("rejects a non-integer id on update", () => {
        const result = todoItemPayloadParse({ id: "x", dueDate: "2026-10-19T00:00:00Z" }, "update");

        expect(result).toMatchObject({
            ok: false,
            details: { fieldErrors: { id: ["Expected number, received string"] } }
        });
    });

    it("rejects an unparseable completion time", () => {
        const result = todoItemPayloadParse(
            { dueDate: "2026-10-19T00:00:00Z", completedDate: "yesterday" },
            "create"
        );

        expect(result).toMatchObject({
            ok: false,
            details: { fieldErrors: { completedDate: ["must be an ISO-8601 timestamp"] } }
        });
    });
});

describe("todoItemIdParse", () => {
    it("accepts any integer", () => {
        expect(todoItemIdParse("1")).toBe(1);
        expect(todoItemIdParse("42")).toBe(42);
        expect(todoItemIdParse("0")).toBe(0);
        expect(todoItemIdParse("-3")).toBe(-3);
        expect(todoItemIdParse("3000000000")).toBe(3000000000);
    });

    it("rejects everything else", () => {
        expect(todoItemIdParse(undefined)).toBeNull();
        expect(todoItemIdParse("")).toBeNull();
        expect(todoItemIdParse("1.5")).toBeNull();
        expect(todoItemIdParse("abc")).toBeNull();
        expect(todoItemIdParse("99999999999999999999")).toBeNull();
    });
});

describe("todoItemIdStorable", () => {
    it("accepts ids within the serial key range", () => {
        expect(todoItemIdStorable(1)).toBe(true);
        expect(todoItemIdStorable(2147483647)).toBe(true);
    });

    it("rejects ids no row can have", () => {
        expect(todoItemIdStorable(0)).toBe(false);
        expect(todoItemIdStorable(-3)).toBe(false);
        expect(todoItemIdStorable(2147483648)).toBe(false);
    });
});
