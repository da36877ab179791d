import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";
import { Router } from "../packages/core/src";
import { logger } from "../packages/middleware/src";

const log = new Logger({ level: Levels.DEBUG, transports: [new ConsoleTransport()] });

const router = new Router<{ requestId: string }>({ logger: log });

router.use(logger({ logger: log, preset: "standard" }));

router.get("/", (ctx) => ctx.text("Hello World"));
router.get("/users/:id", (ctx) => ctx.json({ id: ctx.params.id, requestId: ctx.get("requestId") }));
router.get("/assets/**path/*.{css,js}", (ctx) => ctx.text(`asset ${ctx.params.path}`));

router.scope("/api/v1", (api) => {
	api.get("/health", (ctx) => ctx.json({ status: "ok" }));
	api.post("/echo", async (ctx) => ctx.json(await ctx.body<Record<string, unknown>>()));
});

router.onNotFound((ctx) => ctx.json({ error: "Not Found", path: new URL(ctx.req.url).pathname }, 404));

const requests = [
	new Request("http://localhost/"),
	new Request("http://localhost/users/42"),
	new Request("http://localhost/assets/site/main.css"),
	new Request("http://localhost/api/v1/health"),
	new Request("http://localhost/api/v1/echo", {
		method: "POST",
		body: JSON.stringify({ hello: "world" }),
		headers: { "Content-Type": "application/json" },
	}),
	new Request("http://localhost/missing"),
];

for (const req of requests) {
	const res = await router.handle(req);
	log.info(`${req.method} ${new URL(req.url).pathname} -> ${res.status} ${await res.text()}`);
}
