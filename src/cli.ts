#!/usr/bin/env node
import { Command } from "commander";
import process from "node:process";
import chalk from "chalk";
import { TokenIssueOptionsSchema, loadServerConfig } from "./gatehouse/config.js";
import { toGatehouseError } from "./gatehouse/errors.js";
import { startHttpServer } from "./server/http.js";
import { verifyBearer } from "./auth/middleware.js";
import { createTokenCodec, withIssuer } from "./token/index.js";

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0,
  INVALID_TOKEN: 10,
  ERROR: 30
} as const;

const program = new Command();

program.name("gatehouse").description("JWT authentication and rate limiting middleware for Hono").version("0.1.0");

program
  .command("serve")
  .description("Run the demo HTTP server (configured from GATEHOUSE_* variables)")
  .option("--port <port>", "Port (overrides GATEHOUSE_PORT)")
  .option("--rotate-refresh", "Issue a new refresh token on every refresh", false)
  .action(async (opts: { port?: string; rotateRefresh: boolean }) => {
    const env = { ...process.env };
    if (opts.port) env.GATEHOUSE_PORT = opts.port;
    if (opts.rotateRefresh) env.GATEHOUSE_ROTATE_REFRESH = "true";

    const server = startHttpServer(loadServerConfig(env));

    const shutdown = () => {
      server.close().then(
        () => process.exit(EXIT_CODES.OK),
        (err: unknown) => {
          process.stderr.write(chalk.red(`Shutdown failed: ${toGatehouseError(err).message}\n`));
          process.exit(EXIT_CODES.ERROR);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });

const token = program.command("token").description("Issue and inspect HS256 tokens");

token
  .command("issue")
  .description("Sign a token for a user id")
  .requiredOption("--key <secret>", "Signing key")
  .requiredOption("--uid <uid>", "User id written into the uid claim")
  .option("--expires-in <ms>", "Lifetime in milliseconds", "600000")
  .option("--issuer <iss>", "iss claim", "")
  .action(async (opts: { key: string; uid: string; expiresIn: string; issuer: string }) => {
    const parsed = TokenIssueOptionsSchema.safeParse(opts);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        process.stderr.write(chalk.red(`Invalid ${issue.path.join(".")}: ${issue.message}\n`));
      }
      process.exitCode = EXIT_CODES.ERROR;
      return;
    }
    const { key, uid, expiresIn, issuer } = parsed.data;
    const codec = createTokenCodec(key, expiresIn, withIssuer(issuer));
    const signed = await codec.generate({ uid });
    process.stdout.write(`${signed}\n`);
  });

token
  .command("verify")
  .description("Verify a token and print its claims")
  .argument("<token>", "Compact JWS token")
  .requiredOption("--key <secret>", "Verification key")
  .option("--json", "Output raw JSON", false)
  .action(async (tokenArg: string, opts: { key: string; json: boolean }) => {
    const codec = createTokenCodec(opts.key, 0);
    try {
      const claims = await verifyBearer(codec, tokenArg);
      if (opts.json) {
        process.stdout.write(`${JSON.stringify(claims, null, 2)}\n`);
      } else {
        process.stdout.write(chalk.green("Token is valid\n"));
        for (const [name, value] of Object.entries(claims)) {
          process.stdout.write(`  ${chalk.cyan(name)}: ${JSON.stringify(value)}\n`);
        }
      }
    } catch (err) {
      const error = toGatehouseError(err);
      process.stderr.write(chalk.red(`${error.code}: ${error.message}\n`));
      process.exitCode = error.isAuthError ? EXIT_CODES.INVALID_TOKEN : EXIT_CODES.ERROR;
    }
  });

await program.parseAsync(process.argv);
