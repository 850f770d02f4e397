import type { FastifyInstance } from "fastify";

const CORS_DEFAULT_METHODS = "GET,POST,PUT,DELETE,OPTIONS";

/**
 * Applies the single-origin cross-origin policy.
 * The configured origin may use any header and method; any other Origin is rejected with 403.
 * Requests without an Origin header are same-origin or non-browser and pass through.
 */
export function apiCorsRegister(app: FastifyInstance, origin: string): void {
    app.addHook("onRequest", async (request, reply) => {
        const requestOrigin = headerValue(request.headers.origin);
        if (requestOrigin === undefined) {
            return;
        }
        if (requestOrigin !== origin) {
            return reply.status(403).send({ error: "Origin not allowed" });
        }

        reply.header("access-control-allow-origin", origin);
        reply.header("vary", "Origin");
        if (request.method === "OPTIONS") {
            reply.header(
                "access-control-allow-methods",
                headerValue(request.headers["access-control-request-method"]) ?? CORS_DEFAULT_METHODS
            );
            reply.header(
                "access-control-allow-headers",
                headerValue(request.headers["access-control-request-headers"]) ?? "*"
            );
            return reply.status(204).send();
        }
    });

    // Preflights need a route to match before the hook above can answer them.
    app.options("/*", async (_request, reply) => reply.status(204).send());
}

function headerValue(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}
