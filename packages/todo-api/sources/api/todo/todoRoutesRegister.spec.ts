import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { TodoItemJson } from "@/types";
import type { Storage } from "../../storage/storage.js";
import { storageOpen } from "../../storage/storageOpen.js";
import { apiServerBuild } from "../apiServer.js";

const NOW = new Date("2026-10-18T12:00:00.000Z");
const TOMORROW = "2026-10-19T00:00:00.000Z";

describe("todoRoutesRegister", () => {
    let storage: Storage;
    let app: FastifyInstance;

    beforeEach(async () => {
        storage = await storageOpen(":memory:");
        app = apiServerBuild({
            config: {
                server: { host: "127.0.0.1", port: 0 },
                cors: { origin: "http://localhost:3000" }
            },
            storage,
            now: () => NOW
        });
        await app.ready();
    });

    afterEach(async () => {
        await app.close();
        await storage.close();
    });

    async function itemsGet(path = "/api/Todo"): Promise<TodoItemJson[]> {
        const response = await app.inject({ method: "GET", url: path });
        expect(response.statusCode).toBe(200);
        return response.json<TodoItemJson[]>();
    }

    it("creates, completes and lists an item end to end", async () => {
        const created = await app.inject({
            method: "POST",
            url: "/api/Todo",
            payload: { description: "buy milk", dueDate: TOMORROW }
        });

        expect(created.statusCode).toBe(201);
        expect(created.headers.location).toBe("/api/Todo?id=1");
        const item = {
            id: 1,
            title: null,
            description: "buy milk",
            dueDate: TOMORROW,
            completedDate: null,
            isCompleted: false
        };
        expect(created.json()).toEqual(item);
        expect(await itemsGet()).toEqual([item]);

        const updated = await app.inject({
            method: "PUT",
            url: "/api/Todo/1",
            payload: { ...item, isCompleted: true }
        });

        expect(updated.statusCode).toBe(204);
        expect(updated.body).toBe("");
        const completed = { ...item, completedDate: "2026-10-18T12:00:00.000Z", isCompleted: true };
        expect(await itemsGet()).toEqual([completed]);
        expect(await itemsGet("/api/Todo/completed")).toEqual([completed]);
        expect(await itemsGet("/api/Todo/incomplete")).toEqual([]);
    });

    it("splits every item between the incomplete and completed views", async () => {
        for (const description of ["first", "second", "third"]) {
            await app.inject({ method: "POST", url: "/api/Todo", payload: { description, dueDate: TOMORROW } });
        }
        await app.inject({
            method: "PUT",
            url: "/api/Todo/2",
            payload: { id: 2, description: "second", dueDate: TOMORROW, isCompleted: true }
        });

        const ids = (items: TodoItemJson[]): number[] => items.map((item) => item.id);

        expect(ids(await itemsGet())).toEqual([1, 2, 3]);
        expect(ids(await itemsGet("/api/Todo/incomplete"))).toEqual([1, 3]);
        expect(ids(await itemsGet("/api/Todo/completed"))).toEqual([2]);
    });

    it("rejects a description longer than 100 characters without storing it", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/api/Todo",
            payload: { description: "x".repeat(101), dueDate: TOMORROW }
        });

        expect(response.statusCode).toBe(400);
        expect(response.body).toBe("");
        expect(await itemsGet()).toEqual([]);
    });

    it("rejects a past due date with a text message", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/api/Todo",
            payload: { description: "buy milk", dueDate: "2026-10-17T00:00:00.000Z" }
        });

        expect(response.statusCode).toBe(400);
        expect(response.headers["content-type"]).toBe("text/plain; charset=utf-8");
        expect(response.body).toBe("due date is in the past");
        expect(await itemsGet()).toEqual([]);
    });

    it("describes malformed payloads", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/api/Todo",
            payload: { description: "buy milk" }
        });

        expect(response.statusCode).toBe(400);
        expect(response.json()).toEqual({
            error: "Invalid payload",
            details: { formErrors: [], fieldErrors: { dueDate: ["Required"] } }
        });
    });

    it("keeps fastify's status for unparseable JSON", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/api/Todo",
            headers: { "content-type": "application/json" },
            payload: "{"
        });

        expect(response.statusCode).toBe(400);
        expect(await itemsGet()).toEqual([]);
    });

    it("rejects an update whose body id differs from the route", async () => {
        await app.inject({ method: "POST", url: "/api/Todo", payload: { description: "buy milk", dueDate: TOMORROW } });

        const response = await app.inject({
            method: "PUT",
            url: "/api/Todo/1",
            payload: { id: 2, description: "changed", dueDate: TOMORROW, isCompleted: true }
        });

        expect(response.statusCode).toBe(400);
        expect(response.body).toBe("");
        expect(await itemsGet()).toEqual([
            {
                id: 1,
                title: null,
                description: "buy milk",
                dueDate: TOMORROW,
                completedDate: null,
                isCompleted: false
            }
        ]);
    });

    it("returns 400 for an update route id that is not a number", async () => {
        const response = await app.inject({
            method: "PUT",
            url: "/api/Todo/abc",
            payload: { id: 1, dueDate: TOMORROW }
        });

        expect(response.statusCode).toBe(400);
    });

    it("returns 404 when updating an item that does not exist", async () => {
        const response = await app.inject({
            method: "PUT",
            url: "/api/Todo/7",
            payload: { id: 7, description: "ghost", dueDate: TOMORROW }
        });

        expect(response.statusCode).toBe(404);
        expect(await itemsGet()).toEqual([]);
    });

    it("returns 404 for update and delete ids outside the key range", async () => {
        const updatedLarge = await app.inject({
            method: "PUT",
            url: "/api/Todo/3000000000",
            payload: { id: 3000000000, dueDate: TOMORROW }
        });
        const updatedZero = await app.inject({
            method: "PUT",
            url: "/api/Todo/0",
            payload: { id: 0, dueDate: TOMORROW }
        });
        const deletedLarge = await app.inject({ method: "DELETE", url: "/api/Todo/3000000000" });
        const deletedNegative = await app.inject({ method: "DELETE", url: "/api/Todo/-1" });

        expect(updatedLarge.statusCode).toBe(404);
        expect(updatedZero.statusCode).toBe(404);
        expect(deletedLarge.statusCode).toBe(404);
        expect(deletedNegative.statusCode).toBe(404);
    });

    it("ignores a client id on create", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/api/Todo",
            payload: { id: "x", description: "buy milk", dueDate: TOMORROW }
        });

        expect(response.statusCode).toBe(201);
        expect(response.headers.location).toBe("/api/Todo?id=1");
    });

    it("deletes an item once and then reports it missing", async () => {
        await app.inject({ method: "POST", url: "/api/Todo", payload: { description: "buy milk", dueDate: TOMORROW } });

        const first = await app.inject({ method: "DELETE", url: "/api/Todo/1" });
        const second = await app.inject({ method: "DELETE", url: "/api/Todo/1" });

        expect(first.statusCode).toBe(204);
        expect(second.statusCode).toBe(404);
        expect(await itemsGet()).toEqual([]);
    });

    it("returns 404 when deleting an item that never existed", async () => {
        const response = await app.inject({ method: "DELETE", url: "/api/Todo/12" });

        expect(response.statusCode).toBe(404);
    });

    it("answers store failures with 500", async () => {
        await storage.close();

        const response = await app.inject({
            method: "POST",
            url: "/api/Todo",
            payload: { description: "buy milk", dueDate: TOMORROW }
        });

        expect(response.statusCode).toBe(500);
        expect(response.json()).toEqual({ error: "Internal server error" });
    });
});
