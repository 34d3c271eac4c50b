import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createMessageDispatcher } from "@/chat/dispatcher";
import type { CompletionClient } from "@/completions/completion-client";
import { SqliteCredentialStore } from "@/credentials/store";
import { IN_MEMORY_DATABASE } from "@/db/client";

describe("createMessageDispatcher", () => {
  let store: SqliteCredentialStore;
  const complete = vi.fn<CompletionClient["complete"]>();
  const onCompletionStart = vi.fn(async () => undefined);

  beforeEach(async () => {
    store = new SqliteCredentialStore({
      path: IN_MEMORY_DATABASE,
      encryptionSecret: "test-secret",
    });
    await store.load();
    complete.mockResolvedValue({ ok: true, text: "hi there" });
  });

  afterEach(async () => {
    await store.close();
  });

  const createDispatcher = () =>
    createMessageDispatcher({
      store,
      completions: { complete },
    });

  it("asks for a key first and never calls the provider", async () => {
    const outcome = await createDispatcher().dispatch({
      userId: "42",
      text: "hello",
      onCompletionStart,
    });

    expect(outcome).toEqual({ kind: "missing_key" });
    expect(complete).not.toHaveBeenCalled();
    expect(onCompletionStart).not.toHaveBeenCalled();
  });

  it("relays the first choice verbatim with the caller's key", async () => {
    await store.set("42", "sk-ABCDEFGH1234");

    const outcome = await createDispatcher().dispatch({
      userId: "42",
      text: "hello",
      onCompletionStart,
    });

    expect(outcome).toEqual({ kind: "reply", text: "hi there" });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete).toHaveBeenCalledWith({
      apiKey: "sk-ABCDEFGH1234",
      userText: "hello",
    });
    expect(onCompletionStart).toHaveBeenCalledTimes(1);
  });

  it("uses only the calling user's key", async () => {
    await store.set("1", "sk-user-one-key");
    await store.set("2", "sk-user-two-key");

    await createDispatcher().dispatch({ userId: "2", text: "hello" });

    expect(complete).toHaveBeenCalledWith({
      apiKey: "sk-user-two-key",
      userText: "hello",
    });
  });

  it("maps an auth failure to auth_error", async () => {
    await store.set("42", "sk-ABCDEFGH1234");
    complete.mockResolvedValueOnce({
      ok: false,
      kind: "auth",
      message: "User not found.",
      statusCode: 401,
    });

    await expect(
      createDispatcher().dispatch({ userId: "42", text: "hello" }),
    ).resolves.toEqual({ kind: "auth_error" });
  });

  it("maps other failures to provider_error", async () => {
    await store.set("42", "sk-ABCDEFGH1234");
    complete.mockResolvedValueOnce({
      ok: false,
      kind: "transient",
      message: "Upstream unavailable",
      statusCode: 502,
    });

    await expect(
      createDispatcher().dispatch({ userId: "42", text: "hello" }),
    ).resolves.toEqual({ kind: "provider_error", errorKind: "transient" });
    expect(complete).toHaveBeenCalledTimes(1);
  });
});
