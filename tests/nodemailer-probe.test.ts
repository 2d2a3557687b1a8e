import { createServer, type Server, type Socket } from "node:net";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  categorize,
  NodemailerProbe,
  type TransportFactory,
} from "../src/infrastructure/services/nodemailer-probe.service.js";

const USER = "sender@example.com";
const PASSWORD = "test-secret";

interface SmtpStub {
  port: number;
  verbs: string[];
}

const servers: Server[] = [];
const sockets = new Set<Socket>();

function listen(server: Server): Promise<number> {
  servers.push(server);
  server.on("connection", (socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("error", () => sockets.delete(socket));
  });
  return new Promise((resolve, reject) => {
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address && typeof address === "object") resolve(address.port);
      else reject(new Error("server has no TCP address"));
    });
  });
}

/** Minimal SMTP server: EHLO advertising AUTH PLAIN, a single account, QUIT. */
async function startSmtpStub(): Promise<SmtpStub> {
  const verbs: string[] = [];
  const server = createServer((socket) => {
    socket.write("220 stub.local ESMTP ready\r\n");
    let buffer = "";
    socket.on("data", (chunk: Buffer) => {
      buffer += chunk.toString();
      let idx = buffer.indexOf("\r\n");
      while (idx !== -1) {
        const line = buffer.slice(0, idx);
        buffer = buffer.slice(idx + 2);
        const [verb = "", , credentials = ""] = line.split(" ");
        verbs.push(verb.toUpperCase());
        switch (verb.toUpperCase()) {
          case "EHLO":
            socket.write("250-stub.local\r\n250 AUTH PLAIN\r\n");
            break;
          case "HELO":
            socket.write("250 stub.local\r\n");
            break;
          case "AUTH": {
            const decoded = Buffer.from(credentials, "base64").toString("utf-8");
            socket.write(
              decoded === `\u0000${USER}\u0000${PASSWORD}`
                ? "235 2.7.0 Authentication successful\r\n"
                : "535 5.7.8 Authentication credentials invalid\r\n",
            );
            break;
          }
          case "QUIT":
            socket.end("221 2.0.0 Bye\r\n");
            break;
          default:
            socket.write("502 5.5.2 Command not implemented\r\n");
        }
        idx = buffer.indexOf("\r\n");
      }
    });
  });
  return { port: await listen(server), verbs };
}

afterEach(async () => {
  for (const socket of sockets) socket.destroy();
  sockets.clear();
  await Promise.all(
    servers.splice(0).map((s) => new Promise<void>((resolve) => s.close(() => resolve()))),
  );
});

function snapshot(port: number, password = PASSWORD): Record<string, string> {
  return {
    EMAIL_HOST: "127.0.0.1",
    EMAIL_PORT: String(port),
    EMAIL_USERNAME: USER,
    EMAIL_PASSWORD: password,
  };
}

describe("NodemailerProbe against an in-process SMTP server", () => {
  it("succeeds with valid credentials and sends no message", async () => {
    const stub = await startSmtpStub();

    const result = await new NodemailerProbe(5000).testConnection(snapshot(stub.port));

    expect(result).toEqual({
      success: true,
      message: `Connected to 127.0.0.1:${stub.port} and logged in as ${USER}.`,
    });
    expect(stub.verbs).not.toContain("MAIL");
    expect(stub.verbs).not.toContain("DATA");
  });

  it("reports auth-rejected for a wrong password without echoing it", async () => {
    const stub = await startSmtpStub();

    const result = await new NodemailerProbe(5000).testConnection(snapshot(stub.port, "wrong-secret"));

    expect(result.success).toBe(false);
    expect(result.category).toBe("auth-rejected");
    expect(result.message).toBe(
      `127.0.0.1:${stub.port}: Authentication rejected. Check EMAIL_USERNAME and EMAIL_PASSWORD.`,
    );
  });

  it("reports connection-refused when nothing listens on the port", async () => {
    const server = createServer();
    const port = await listen(server);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    servers.splice(servers.indexOf(server), 1);

    const result = await new NodemailerProbe(5000).testConnection(snapshot(port));

    expect(result.success).toBe(false);
    expect(result.category).toBe("connection-refused");
  });

  it("gives up on a silent server within the timeout", async () => {
    const server = createServer(() => {
      // accepts, never greets
    });
    const port = await listen(server);

    const started = Date.now();
    const result = await new NodemailerProbe(300).testConnection(snapshot(port));
    const elapsed = Date.now() - started;

    expect(result.success).toBe(false);
    expect(result.category).toBe("timeout");
    expect(elapsed).toBeLessThan(2000);
  });
});

describe("NodemailerProbe with a fake transport", () => {
  function fakeFactory(verify: () => Promise<true>) {
    const close = vi.fn();
    const factory = vi.fn<TransportFactory>(() => ({ verify, close }));
    return { factory, close };
  }

  it("reports incomplete-config without connecting", async () => {
    const { factory } = fakeFactory(async () => true);

    const result = await new NodemailerProbe(1000, factory).testConnection({
      EMAIL_HOST: "smtp.example.com",
      EMAIL_USERNAME: USER,
      EMAIL_PASSWORD: "",
    });

    expect(result).toEqual({
      success: false,
      category: "incomplete-config",
      message: "Email settings are incomplete. Set EMAIL_USERNAME and EMAIL_PASSWORD.",
    });
    expect(factory).not.toHaveBeenCalled();
  });

  it("falls back to the Gmail relay on port 587 and uses implicit TLS only on 465", async () => {
    const { factory } = fakeFactory(async () => true);
    const probe = new NodemailerProbe(1000, factory);

    await probe.testConnection({ EMAIL_USERNAME: USER, EMAIL_PASSWORD: PASSWORD });
    await probe.testConnection({ ...snapshot(465), EMAIL_HOST: "smtp.example.com" });

    expect(factory.mock.calls[0][0]).toMatchObject({ host: "smtp.gmail.com", port: 587, secure: false });
    expect(factory.mock.calls[1][0]).toMatchObject({
      host: "smtp.example.com",
      port: 465,
      secure: true,
      connectionTimeout: 1000,
      greetingTimeout: 1000,
      socketTimeout: 1000,
    });
  });

  it("adds the app password hint for Gmail rejections and closes the transport", async () => {
    const { factory, close } = fakeFactory(async () => {
      throw Object.assign(
        new Error("Invalid login: 535-5.7.8 Username and Password not accepted."),
        { code: "EAUTH" },
      );
    });

    const result = await new NodemailerProbe(1000, factory).testConnection({
      EMAIL_USERNAME: USER,
      EMAIL_PASSWORD: PASSWORD,
    });

    expect(result.category).toBe("auth-rejected");
    expect(result.message).toBe(
      "smtp.gmail.com:587: Authentication rejected. Check EMAIL_USERNAME and EMAIL_PASSWORD. " +
        "Gmail accounts need an app password: https://myaccount.google.com/apppasswords",
    );
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("stops waiting at the timeout even when the transport never answers", async () => {
    const { factory, close } = fakeFactory(() => new Promise<true>(() => {}));

    const result = await new NodemailerProbe(50, factory).testConnection({
      EMAIL_USERNAME: USER,
      EMAIL_PASSWORD: PASSWORD,
    });

    expect(result.category).toBe("timeout");
    expect(close).toHaveBeenCalledTimes(1);
  });
});

describe("categorize", () => {
  const err = (message: string, code?: string) => Object.assign(new Error(message), code ? { code } : {});

  it.each([
    [err("Invalid login", "EAUTH"), "auth-rejected"],
    [err("Greeting never received", "ETIMEDOUT"), "timeout"],
    [err("getaddrinfo ENOTFOUND smtp.invalid", "EDNS"), "unknown-host"],
    [err("getaddrinfo EAI_AGAIN smtp.invalid", "ECONNECTION"), "unknown-host"],
    [err("connect ECONNREFUSED 127.0.0.1:25", "ECONNECTION"), "connection-refused"],
    [err("self-signed certificate in certificate chain", "ESOCKET"), "tls"],
    [err("Error initiating TLS", "ETLS"), "tls"],
    [err("socket hang up", "ESOCKET"), "unreachable"],
  ] as const)("maps %s to %s", (error, category) => {
    expect(categorize(error)).toBe(category);
  });
});
