import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { once } from "node:events";
import { connect } from "node:net";
import type { Socket } from "node:net";
import { Registry } from "prom-client";
import { MetricsCollector } from "@wordgate/metrics";
import type { SessionEvent } from "@wordgate/schemas";
import { WORDS, answer } from "@wordgate/words";
import { ChallengeServer } from "./challenge-server.js";
import type { ChallengeServerConfig } from "./challenge-server.js";

const FLAG = Buffer.from("flag{win}");
const GREETING = "hello! let's play a game :3";

class TestClient {
  transcript = "";
  private buffer = "";
  private ended = false;
  private waiters: Array<() => void> = [];
  readonly closed: Promise<string>;

  private constructor(private readonly socket: Socket) {
    socket.setEncoding("latin1");
    socket.on("data", (chunk: string) => {
      this.buffer += chunk;
      this.transcript += chunk;
      this.wake();
    });
    // Resets from the server surface as a close below.
    socket.on("error", () => {});
    this.closed = new Promise((resolve) => {
      socket.on("close", () => {
        this.ended = true;
        this.wake();
        resolve(this.transcript);
      });
    });
  }

  static async connect(port: number): Promise<TestClient> {
    const socket = connect(port, "127.0.0.1");
    const client = new TestClient(socket);
    await once(socket, "connect");
    return client;
  }

  async readLine(): Promise<string> {
    for (;;) {
      const newline = this.buffer.indexOf("\n");
      if (newline >= 0) {
        const line = this.buffer.slice(0, newline);
        this.buffer = this.buffer.slice(newline + 1);
        return line;
      }
      if (this.ended) throw new Error(`connection closed mid-line: ${JSON.stringify(this.buffer)}`);
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  destroy(): void {
    this.socket.destroy();
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }
}

function answersFor(promptLine: string): string[] {
  return promptLine.split(" ").map(answer);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function greet(client: TestClient): Promise<void> {
  await client.send("hello");
  expect(await client.readLine()).toBe(GREETING);
  await client.send("ok");
}

describe("ChallengeServer", () => {
  let server: ChallengeServer;
  let port: number;
  let metrics: MetricsCollector;
  let outcomes: string[];
  let now: number;

  async function start(overrides: Partial<ChallengeServerConfig> = {}): Promise<void> {
    metrics = new MetricsCollector({ registry: new Registry(), collectDefault: false });
    outcomes = [];
    server = new ChallengeServer({
      port: 0,
      flag: FLAG,
      coalesceMs: 20,
      metrics,
      onSessionEvent: (event: SessionEvent) => {
        const outcome = event.payload.outcome;
        if (event.type === "session.closed" && typeof outcome === "string") {
          outcomes.push(outcome);
        }
      },
      ...overrides,
    });
    port = (await server.listen()).port;
  }

  beforeEach(() => {
    now = 0;
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    await server.close();
    vi.restoreAllMocks();
  });

  it("binds to loopback and logs the address", async () => {
    await start();
    expect(console.log).toHaveBeenCalledWith(`[wordgate] starting server on 127.0.0.1:${port}`, "");
  });

  it("plays a full game and hands over the flag", async () => {
    await start();
    const client = await TestClient.connect(port);
    await greet(client);

    const prompted: string[] = [];
    for (let round = 0; round < 4; round++) {
      const prompt = await client.readLine();
      const words = prompt.split(" ");
      expect(words).toHaveLength(8);
      prompted.push(...words);
      await client.send(`${answersFor(prompt).join(" ")}\n`);
    }

    expect(await client.readLine()).toBe("good job! the flag is flag{win}");
    await client.closed;
    expect([...prompted].sort()).toEqual([...WORDS].sort());
  });

  it("rejects a bad greeting", async () => {
    await start();
    const client = await TestClient.connect(port);
    await client.send("hi\n");
    expect(await client.closed).toBe("that's not a nice greeting...\n");
  });

  it("closes politely when the client will not play", async () => {
    await start();
    const client = await TestClient.connect(port);
    await client.send("hello");
    expect(await client.readLine()).toBe(GREETING);
    await client.send("no");
    expect(await client.closed).toBe(`${GREETING}\nokay, we can play later then...`);
  });

  it("rejects a wrong word and logs what was expected", async () => {
    await start();
    const client = await TestClient.connect(port);
    await greet(client);

    await client.send(`${answersFor(await client.readLine()).join(" ")}\n`);
    const round1 = answersFor(await client.readLine());
    const expected = round1[3];
    round1[3] = "banana";
    await client.send(`${round1.join(" ")}\n`);

    const transcript = await client.closed;
    expect(transcript.endsWith("you said the wrong word!\n")).toBe(true);
    expect(transcript).not.toContain("flag{win}");
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringMatching(new RegExp(`^\\[session:[0-9a-f-]{36}\\] expected ${expected} got banana$`)),
      { round: 1, position: 3 },
    );
  });

  it("times out a client that is too slow between rounds", async () => {
    await start({ clock: () => now });
    const client = await TestClient.connect(port);
    await greet(client);

    const prompt = await client.readLine();
    now += 6000;
    await client.send(`${answersFor(prompt).join(" ")}\n`);

    expect(await client.closed).toBe(`${GREETING}\n${prompt}\nyou took too long!`);
  });

  it("joins a greeting split across two segments", async () => {
    await start({ coalesceMs: 200 });
    const client = await TestClient.connect(port);
    await client.send("hel");
    await sleep(10);
    await client.send("lo");
    expect(await client.readLine()).toBe(GREETING);
    await client.send("ok\n");
    for (let round = 0; round < 4; round++) {
      const answers = answersFor(await client.readLine());
      // Split each reply mid-token as well.
      const reply = `${answers.join(" ")}\n`;
      await client.send(reply.slice(0, 5));
      await sleep(5);
      await client.send(reply.slice(5));
    }
    expect(await client.readLine()).toBe("good job! the flag is flag{win}");
  });

  it("serves clients concurrently", async () => {
    await start();
    const a = await TestClient.connect(port);
    const b = await TestClient.connect(port);
    await greet(a);
    await greet(b);

    for (let round = 0; round < 4; round++) {
      const promptA = await a.readLine();
      const promptB = await b.readLine();
      await b.send(`${answersFor(promptB).join(" ")}\n`);
      await a.send(`${answersFor(promptA).join(" ")}\n`);
    }

    expect(await a.readLine()).toBe("good job! the flag is flag{win}");
    expect(await b.readLine()).toBe("good job! the flag is flag{win}");
  });

  it("keeps serving after a client disconnects mid-game", async () => {
    await start();
    const quitter = await TestClient.connect(port);
    await greet(quitter);
    await quitter.readLine();
    quitter.destroy();
    await vi.waitFor(() => expect(outcomes).toContain("peer_closed"));

    const next = await TestClient.connect(port);
    await next.send("hi\n");
    expect(await next.closed).toBe("that's not a nice greeting...\n");
  });

  it("records outcomes in the metrics collector", async () => {
    await start();
    const client = await TestClient.connect(port);
    await client.send("nope\n");
    await client.closed;
    await vi.waitFor(() => expect(outcomes).toEqual(["bad_greeting"]));

    const text = await metrics.getMetrics();
    expect(text).toContain('wordgate_sessions_total{outcome="bad_greeting"} 1');
    expect(await metrics.getActiveSessions()).toBe(0);
  });

  it("logs connection lifecycle without ever printing the flag", async () => {
    await start();
    const client = await TestClient.connect(port);
    await greet(client);
    for (let round = 0; round < 4; round++) {
      await client.send(`${answersFor(await client.readLine()).join(" ")}\n`);
    }
    await client.readLine();
    await client.closed;
    await vi.waitFor(() => expect(server.activeSessions).toBe(0));

    const lines = vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => /\] received connection: 127\.0\.0\.1:\d+$/.test(line))).toBe(true);
    expect(lines.some((line) => line.endsWith("] shutting down connection"))).toBe(true);
    const everything = [console.log, console.warn, console.error]
      .flatMap((fn) => vi.mocked(fn).mock.calls)
      .map((call) => JSON.stringify(call))
      .join("\n");
    expect(everything).not.toContain("flag{win}");
  });

  it("close() drops idle sessions", async () => {
    await start();
    const client = await TestClient.connect(port);
    await vi.waitFor(() => expect(server.activeSessions).toBe(1));
    await server.close();
    expect(await client.closed).toBe("");
  });

  it("listen() rejects when the port is taken", async () => {
    await start();
    const clash = new ChallengeServer({ port, flag: FLAG });
    await expect(clash.listen()).rejects.toMatchObject({ code: "EADDRINUSE" });
  });
});
