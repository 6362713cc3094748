import { describe, it, expect, vi } from "vitest";
import { createAgent } from "../agent.js";
import { createSessionManager } from "../session-manager.js";
import { ok } from "../types/tool.js";
import type { GenerateResponse, Provider, Tool } from "../types/index.js";

const answer = (content: string): GenerateResponse => ({
  message: { role: "assistant", content },
  finishReason: "stop",
});

const loopCall: GenerateResponse = {
  message: {
    role: "assistant",
    content: null,
    toolCalls: [{ id: "call_1", name: "noop", arguments: {} }],
  },
  finishReason: "tool_calls",
};

const noop: Tool = {
  name: "noop",
  description: "Does nothing",
  parameters: { type: "object", properties: {} },
  execute: () => ok(""),
};

function managerWith(generate: Provider["generate"], maxSteps?: number) {
  const agent = createAgent({
    name: "session-agent",
    systemPrompt: "Test",
    provider: { name: "mock", generate },
    tools: [noop],
    maxSteps,
  });
  return createSessionManager(agent);
}

describe("createSessionManager", () => {
  it("refuses prompts for unknown sessions", async () => {
    const manager = managerWith(vi.fn(async () => answer("hi")));

    expect(await manager.prompt("missing", "Hello")).toEqual({
      stopReason: "refusal",
      message: "Unknown session: missing",
    });
  });

  it("ends a normal turn with end_turn and keeps the conversation", async () => {
    const generate = vi
      .fn<Provider["generate"]>()
      .mockResolvedValueOnce(answer("First"))
      .mockResolvedValueOnce(answer("Second"));
    const manager = managerWith(generate);
    const id = manager.newSession();

    const first = await manager.prompt(id, "one");
    const second = await manager.prompt(id, "two");

    expect(first.stopReason).toBe("end_turn");
    expect(second.stopReason).toBe("end_turn");
    expect(second.result?.response).toBe("Second");
    expect(second.result?.messages.map((m) => m.role)).toEqual([
      "system",
      "user",
      "assistant",
      "user",
      "assistant",
    ]);
  });

  it("keeps sessions apart", async () => {
    const manager = managerWith(vi.fn(async () => answer("ok")));
    const a = manager.newSession();
    const b = manager.newSession();

    await manager.prompt(a, "hello");

    expect(a).not.toBe(b);
    expect(manager.getSession(a)?.steps).toBe(1);
    expect(manager.getSession(b)?.steps).toBe(0);
    expect(manager.listSessions().map((s) => s.id)).toEqual([a, b]);
  });

  it("maps the step limit to max_turn_requests", async () => {
    const manager = managerWith(vi.fn(async () => loopCall), 2);
    const id = manager.newSession();

    const result = await manager.prompt(id, "loop");

    expect(result.stopReason).toBe("max_turn_requests");
    expect(result.result?.steps).toBe(2);
  });

  it("maps provider failures to a refusal with the error message", async () => {
    const manager = managerWith(vi.fn().mockRejectedValue(new Error("quota exceeded")));
    const id = manager.newSession();

    const result = await manager.prompt(id, "hi");

    expect(result.stopReason).toBe("refusal");
    expect(result.message).toBe("quota exceeded");
  });

  it("cancels an in-flight turn between steps", async () => {
    const generate = vi.fn(async () => {
      manager.cancel(id);
      return loopCall;
    });
    const manager = managerWith(generate);
    const id = manager.newSession();

    const result = await manager.prompt(id, "go");

    expect(result.stopReason).toBe("cancelled");
    expect(generate).toHaveBeenCalledTimes(1);
    expect(manager.getSession(id)?.cancelled).toBe(true);

    // A new prompt starts afresh
    generate.mockImplementationOnce(async () => answer("back"));
    expect((await manager.prompt(id, "again")).stopReason).toBe("end_turn");
  });

  it("refuses a second prompt while one is running", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const manager = managerWith(
      vi.fn(async () => {
        await gate;
        return answer("done");
      })
    );
    const id = manager.newSession();

    const running = manager.prompt(id, "first");
    const second = await manager.prompt(id, "second");
    release();

    expect(second).toEqual({
      stopReason: "refusal",
      message: `Session ${id} is already running`,
    });
    expect((await running).stopReason).toBe("end_turn");
  });

  it("reports cancel and close on unknown sessions", () => {
    const manager = managerWith(vi.fn(async () => answer("ok")));
    const id = manager.newSession();

    expect(manager.cancel("missing")).toBe(false);
    expect(manager.close(id)).toBe(true);
    expect(manager.close(id)).toBe(false);
    expect(manager.getSession(id)).toBeUndefined();
  });
});
