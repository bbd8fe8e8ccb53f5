import pino from "pino";
import { buildServer } from "./app.js";
import { loadConfig } from "../config.js";

export interface StartupLog {
  error(obj: object, msg: string): void;
}

const defaultLog: StartupLog = pino({ name: "server" });

/**
 * Load the config and start listening.
 * Resolves to undefined when the config is malformed or the port can't be bound;
 * the failure is logged and the caller decides how to exit.
 */
export async function startServer(
  env: NodeJS.ProcessEnv = process.env,
  log: StartupLog = defaultLog,
): Promise<ReturnType<typeof buildServer> | undefined> {
  try {
    const config = loadConfig(env);
    const server = buildServer({ config });
    const { port, host } = config.server;

    await server.listen({ port, host });
    console.log(`🚀 agent-forge server running on http://${host}:${port}`);
    console.log(`   Health: http://localhost:${port}/health`);
    console.log(`   GET  /frameworks, /templates, /providers`);
    console.log(`   POST /generate to generate an agent system`);
    console.log(`   POST /download to get the generated file`);
    return server;
  } catch (err) {
    log.error({ err }, "Server failed to start");
    return undefined;
  }
}
