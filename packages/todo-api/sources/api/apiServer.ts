import fastify, { type FastifyInstance } from "fastify";

import type { Config } from "@/types";
import { getLogger } from "../log.js";
import type { Storage } from "../storage/storage.js";
import { apiCorsRegister } from "./apiCorsRegister.js";
import { apiErrorStatusResolve } from "./apiErrorStatusResolve.js";
import { todoRoutesRegister } from "./todo/todoRoutesRegister.js";

export type ApiServerOptions = {
    config: Pick<Config, "server" | "cors">;
    storage: Storage;
    now?: () => Date;
};

export type ApiServer = {
    address: string;
    close: () => Promise<void>;
};

const logger = getLogger("api.server");

/**
 * Builds the HTTP app without listening. Tests drive it through inject().
 */
export function apiServerBuild(options: ApiServerOptions): FastifyInstance {
    const app = fastify({ logger: false });

    apiCorsRegister(app, options.config.cors.origin);

    app.setErrorHandler(async (error, request, reply) => {
        const statusCode = apiErrorStatusResolve(error);
        if (statusCode >= 500) {
            logger.error({ error, method: request.method, url: request.url }, "Request failed");
            return reply.status(statusCode).send({ error: "Internal server error" });
        }
        return reply.status(statusCode).send({ error: error.message });
    });

    todoRoutesRegister(app, {
        todoItems: options.storage.todoItems,
        now: options.now ?? (() => new Date())
    });

    return app;
}

/**
 * Builds the app and listens on the configured host and port.
 */
export async function apiServerStart(options: ApiServerOptions): Promise<ApiServer> {
    const app = apiServerBuild(options);
    const address = await app.listen({ host: options.config.server.host, port: options.config.server.port });
    logger.info({ address, origin: options.config.cors.origin }, "API server ready");

    return {
        address,
        close: async () => {
            await app.close();
        }
    };
}
