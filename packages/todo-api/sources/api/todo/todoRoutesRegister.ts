import type { FastifyInstance, FastifyReply } from "fastify";

import { getLogger } from "../../log.js";
import { todoItemsCreate } from "./todoItemsCreate.js";
import { todoItemsDelete } from "./todoItemsDelete.js";
import { type TodoItemsListScope, todoItemsList } from "./todoItemsList.js";
import { todoItemsUpdate } from "./todoItemsUpdate.js";
import type { TodoItemsStore, TodoRequestFailure } from "./todoTypes.js";

export const TODO_ROUTE_BASE = "/api/Todo";

export type TodoRoutesRuntime = {
    todoItems: TodoItemsStore;
    now: () => Date;
};

type TodoRouteParams = {
    id: string;
};

const logger = getLogger("api.todo");

/**
 * Registers the /api/Todo resource: three list views, create, full update and delete.
 * Expects: runtime.todoItems points at migrated storage.
 */
export function todoRoutesRegister(app: FastifyInstance, runtime: TodoRoutesRuntime): void {
    const listRoutes: Array<[string, TodoItemsListScope]> = [
        [TODO_ROUTE_BASE, "all"],
        [`${TODO_ROUTE_BASE}/incomplete`, "incomplete"],
        [`${TODO_ROUTE_BASE}/completed`, "completed"]
    ];
    for (const [url, scope] of listRoutes) {
        app.get(url, async (_request, reply) => {
            const items = await todoItemsList({ scope, todoItems: runtime.todoItems });
            return reply.status(200).send(items);
        });
    }

    app.post(TODO_ROUTE_BASE, async (request, reply) => {
        const result = await todoItemsCreate({
            body: request.body,
            now: runtime.now,
            todoItems: runtime.todoItems
        });
        if (!result.ok) {
            return todoFailureSend(reply, result);
        }
        logger.info({ itemId: result.item.id }, "Todo item created");
        return reply
            .status(201)
            .header("location", `${TODO_ROUTE_BASE}?id=${result.item.id}`)
            .send(result.item);
    });

    app.put<{ Params: TodoRouteParams }>(`${TODO_ROUTE_BASE}/:id`, async (request, reply) => {
        const result = await todoItemsUpdate({
            id: request.params.id,
            body: request.body,
            now: runtime.now,
            todoItems: runtime.todoItems
        });
        if (!result.ok) {
            return todoFailureSend(reply, result);
        }
        logger.info({ itemId: result.id }, "Todo item updated");
        return reply.status(204).send();
    });

    app.delete<{ Params: TodoRouteParams }>(`${TODO_ROUTE_BASE}/:id`, async (request, reply) => {
        const result = await todoItemsDelete({ id: request.params.id, todoItems: runtime.todoItems });
        if (!result.ok) {
            return todoFailureSend(reply, result);
        }
        logger.info({ itemId: result.id }, "Todo item deleted");
        return reply.status(204).send();
    });
}

function todoFailureSend(reply: FastifyReply, failure: TodoRequestFailure): FastifyReply {
    if (failure.kind === "not_found") {
        return reply.status(404).send();
    }
    if (failure.details) {
        return reply.status(400).send({ error: failure.message, details: failure.details });
    }
    if (failure.message) {
        return reply.status(400).type("text/plain; charset=utf-8").send(failure.message);
    }
    return reply.status(400).send();
}
