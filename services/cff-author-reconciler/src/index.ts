import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { getConfig } from "./config";
import { health } from "./routes/health";
import { reconcileRoute } from "./routes/reconcile";
import { webhookRoute } from "./routes/webhook";

const app = new Hono();

app.route("/", health);
app.route("/", reconcileRoute);
app.route("/", webhookRoute);

const config = getConfig();
console.log(`CFF author reconciler listening on :${config.PORT}`);
serve({ fetch: app.fetch, port: config.PORT });

process.on("SIGTERM", () => {
  console.log("SIGTERM received, shutting down");
  process.exit(0);
});

export { app };
