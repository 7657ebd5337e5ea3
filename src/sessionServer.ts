import express from "express";
import { z } from "zod";
import { Autopilot, SessionState } from "./autopilot";
import { LocalIdeHost } from "./localIdeHost";
import { errorMessageOf } from "./logging";

const inputBodySchema = z.object({
  message: z.string(),
});

export interface ControllerResponse {
  status: number;
  body: SessionState | { error: string };
}

export function formatStateEvent(state: SessionState): string {
  return `event: state\ndata: ${JSON.stringify(state)}\n\n`;
}

/**
 * Request handling for the session routes, kept apart from express so it
 * can be driven directly.
 */
export class SessionController {
  constructor(private readonly autopilot: Autopilot) {}

  getState(): ControllerResponse {
    return { status: 200, body: this.autopilot.getState() };
  }

  async postInput(body: unknown): Promise<ControllerResponse> {
    const parsed = inputBodySchema.safeParse(body);
    if (!parsed.success) {
      return { status: 400, body: { error: "message (string) is required" } };
    }

    const delivered = await this.autopilot.deliverUserInput(parsed.data.message);
    if (!delivered) {
      return { status: 409, body: { error: "No step is waiting for user input" } };
    }
    return { status: 200, body: this.autopilot.getState() };
  }
}

export function createSessionApp(autopilot: Autopilot): express.Express {
  const app = express();
  app.use(express.json());

  const controller = new SessionController(autopilot);

  app.get("/api/session", (_req, res) => {
    const { status, body } = controller.getState();
    res.status(status).json(body);
  });

  app.post("/api/session/input", async (req, res) => {
    try {
      const { status, body } = await controller.postInput(req.body);
      res.status(status).json(body);
    } catch (err) {
      console.error("Error delivering user input", err);
      res.status(500).json({ error: errorMessageOf(err) });
    }
  });

  // Server-sent events: one "state" event now and after every update.
  app.get("/api/session/events", (req, res) => {
    res.set({
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.flushHeaders();

    const send = (state: SessionState) => {
      res.write(formatStateEvent(state));
    };
    send(autopilot.getState());
    const unsubscribe = autopilot.subscribe(send);
    req.on("close", unsubscribe);
  });

  return app;
}

export function startSessionServer(autopilot: Autopilot, port: number = 4000) {
  const app = createSessionApp(autopilot);
  return app.listen(port, () => {
    console.log(`Session server listening on http://localhost:${port}`);
  });
}

// If run directly: serve a session over the current directory.
if (require.main === module) {
  const port = process.env.PORT ? Number(process.env.PORT) : 4000;
  const autopilot = Autopilot.fromWorkspace(new LocalIdeHost(process.cwd()));
  startSessionServer(autopilot, port);
}
