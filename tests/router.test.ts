import type { Update } from "grammy/types";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createMessageDispatcher } from "@/chat/dispatcher";
import type { CompletionClient } from "@/completions/completion-client";
import { createCredentialService } from "@/credentials/service";
import { SqliteCredentialStore } from "@/credentials/store";
import { IN_MEMORY_DATABASE } from "@/db/client";
import type { TelegramGateway } from "@/telegram/bot";
import { REPLY_TEXT } from "@/telegram/replies";
import { createUpdateRouter, parseCommand } from "@/telegram/router";

const CHAT_ID = 777;
const MESSAGE_ID = 50;

const createTextUpdate = (text: string) =>
  ({
    update_id: 1,
    message: {
      message_id: MESSAGE_ID,
      date: 1,
      chat: {
        id: CHAT_ID,
        type: "private",
      },
      from: {
        id: 123,
        first_name: "Test",
        is_bot: false,
      },
      text,
    },
  }) as Update;

describe("parseCommand", () => {
  it("lowercases the command and strips the bot mention", () => {
    expect(parseCommand("/SetKey@relay_bot  sk-abc  extra")).toEqual({
      command: "/setkey",
      args: ["sk-abc", "extra"],
    });
  });
});

describe("update router", () => {
  let store: SqliteCredentialStore;
  const complete = vi.fn<CompletionClient["complete"]>();
  const telegram = {
    sendText: vi.fn<TelegramGateway["sendText"]>(),
    sendHtml: vi.fn<TelegramGateway["sendHtml"]>(),
    deleteMessage: vi.fn<TelegramGateway["deleteMessage"]>(),
    sendTyping: vi.fn<TelegramGateway["sendTyping"]>(),
  };

  beforeEach(async () => {
    store = new SqliteCredentialStore({
      path: IN_MEMORY_DATABASE,
      encryptionSecret: "test-secret",
    });
    await store.load();

    telegram.sendText.mockResolvedValue(undefined);
    telegram.sendHtml.mockResolvedValue(undefined);
    telegram.deleteMessage.mockResolvedValue(undefined);
    telegram.sendTyping.mockResolvedValue(undefined);
    complete.mockResolvedValue({ ok: true, text: "model reply" });
  });

  afterEach(async () => {
    await store.close();
  });

  const createRouter = () =>
    createUpdateRouter({
      credentials: createCredentialService(store),
      dispatcher: createMessageDispatcher({ store, completions: { complete } }),
      telegram,
    });

  it("greets the user by name with HTML on /start", async () => {
    const result = await createRouter().routeUpdate(createTextUpdate("/start"));

    expect(result).toEqual({ handled: true, route: "start" });
    expect(telegram.sendHtml).toHaveBeenCalledTimes(1);
    expect(telegram.sendHtml).toHaveBeenCalledWith(
      CHAT_ID,
      expect.stringContaining("Hi <b>Test</b>, I'm <b>Will</b>"),
    );
    expect(telegram.sendHtml).toHaveBeenCalledWith(
      CHAT_ID,
      expect.stringContaining("<code>/setkey YOUR_API_KEY</code>"),
    );
  });

  it("stores the key, deletes the message and confirms", async () => {
    const result = await createRouter().routeUpdate(
      createTextUpdate("/setkey sk-ABCDEFGH1234"),
    );

    expect(result).toEqual({ handled: true, route: "setkey" });
    await expect(store.get("123")).resolves.toBe("sk-ABCDEFGH1234");
    expect(telegram.deleteMessage).toHaveBeenCalledWith(CHAT_ID, MESSAGE_ID);
    expect(telegram.sendText).toHaveBeenCalledWith(CHAT_ID, REPLY_TEXT.keySavedAndDeleted);
  });

  it("keeps the key and asks for manual deletion when delete fails", async () => {
    telegram.deleteMessage.mockRejectedValueOnce(new Error("message can't be deleted"));

    await createRouter().routeUpdate(createTextUpdate("/setkey sk-ABCDEFGH1234"));

    await expect(store.get("123")).resolves.toBe("sk-ABCDEFGH1234");
    expect(telegram.sendText).toHaveBeenCalledTimes(1);
    expect(telegram.sendText).toHaveBeenCalledWith(
      CHAT_ID,
      REPLY_TEXT.keySavedDeleteManually,
    );
  });

  it("replies with usage when /setkey has no argument", async () => {
    await createRouter().routeUpdate(createTextUpdate("/setkey"));

    expect(telegram.sendText).toHaveBeenCalledWith(CHAT_ID, REPLY_TEXT.setKeyUsage);
    expect(telegram.deleteMessage).not.toHaveBeenCalled();
    await expect(store.get("123")).resolves.toBeNull();
  });

  it("shows a masked preview on /mykey and its alias", async () => {
    await store.set("123", "sk-ABCDEFGH1234");

    await createRouter().routeUpdate(createTextUpdate("/mykey"));
    await createRouter().routeUpdate(createTextUpdate("/showkey"));

    expect(telegram.sendHtml).toHaveBeenCalledTimes(2);
    expect(telegram.sendHtml).toHaveBeenNthCalledWith(
      1,
      CHAT_ID,
      "You have an API key set: <code>sk-A...1234</code>",
    );
  });

  it("reports a missing key on /mykey", async () => {
    await createRouter().routeUpdate(createTextUpdate("/mykey"));

    expect(telegram.sendText).toHaveBeenCalledWith(CHAT_ID, REPLY_TEXT.noKeyToShow);
  });

  it("removes the key on /delkey and reports when none is left", async () => {
    await store.set("123", "sk-ABCDEFGH1234");
    const router = createRouter();

    await router.routeUpdate(createTextUpdate("/delkey"));
    await router.routeUpdate(createTextUpdate("/deletekey"));

    expect(telegram.sendText).toHaveBeenNthCalledWith(1, CHAT_ID, REPLY_TEXT.keyRemoved);
    expect(telegram.sendText).toHaveBeenNthCalledWith(2, CHAT_ID, REPLY_TEXT.noKeyToRemove);
    await expect(store.get("123")).resolves.toBeNull();
  });

  it("asks for a key before chatting", async () => {
    const result = await createRouter().routeUpdate(createTextUpdate("hello"));

    expect(result).toEqual({ handled: true, route: "chat" });
    expect(complete).not.toHaveBeenCalled();
    expect(telegram.sendTyping).not.toHaveBeenCalled();
    expect(telegram.sendText).toHaveBeenCalledWith(CHAT_ID, REPLY_TEXT.setKeyFirst);
  });

  it("shows typing and relays the model reply", async () => {
    await store.set("123", "sk-ABCDEFGH1234");

    await createRouter().routeUpdate(createTextUpdate("hello"));

    expect(telegram.sendTyping).toHaveBeenCalledWith(CHAT_ID);
    expect(complete).toHaveBeenCalledWith({
      apiKey: "sk-ABCDEFGH1234",
      userText: "hello",
    });
    expect(telegram.sendText).toHaveBeenCalledWith(CHAT_ID, "model reply");
  });

  it("still replies when the typing indicator fails", async () => {
    await store.set("123", "sk-ABCDEFGH1234");
    telegram.sendTyping.mockRejectedValueOnce(new Error("Too Many Requests"));

    await createRouter().routeUpdate(createTextUpdate("hello"));

    expect(telegram.sendText).toHaveBeenCalledWith(CHAT_ID, "model reply");
  });

  it("falls back to the generic reply when the model reply cannot be sent", async () => {
    await store.set("123", "sk-ABCDEFGH1234");
    telegram.sendText.mockRejectedValueOnce(new Error("Bad Request: message text is empty"));

    const result = await createRouter().routeUpdate(createTextUpdate("hello"));

    expect(result).toEqual({ handled: true, route: "chat" });
    expect(telegram.sendText).toHaveBeenCalledTimes(2);
    expect(telegram.sendText).toHaveBeenNthCalledWith(1, CHAT_ID, "model reply");
    expect(telegram.sendText).toHaveBeenNthCalledWith(2, CHAT_ID, REPLY_TEXT.genericFailure);
  });

  it("relays a blank completion as the generic failure", async () => {
    await store.set("123", "sk-ABCDEFGH1234");
    complete.mockResolvedValueOnce({
      ok: false,
      kind: "unknown",
      message: "Provider returned an empty completion.",
    });

    await createRouter().routeUpdate(createTextUpdate("hello"));

    expect(telegram.sendText).toHaveBeenCalledTimes(1);
    expect(telegram.sendText).toHaveBeenCalledWith(CHAT_ID, REPLY_TEXT.genericFailure);
  });

  it("maps provider failures to fixed replies", async () => {
    await store.set("123", "sk-ABCDEFGH1234");
    complete
      .mockResolvedValueOnce({ ok: false, kind: "auth", message: "User not found.", statusCode: 401 })
      .mockResolvedValueOnce({ ok: false, kind: "unknown", message: "boom" });
    const router = createRouter();

    await router.routeUpdate(createTextUpdate("first"));
    await router.routeUpdate(createTextUpdate("second"));

    expect(telegram.sendText).toHaveBeenNthCalledWith(1, CHAT_ID, REPLY_TEXT.invalidKey);
    expect(telegram.sendText).toHaveBeenNthCalledWith(2, CHAT_ID, REPLY_TEXT.genericFailure);
  });

  it("ignores unknown commands", async () => {
    const result = await createRouter().routeUpdate(createTextUpdate("/weather"));

    expect(result).toEqual({ handled: false, reason: "unknown_command" });
    expect(telegram.sendText).not.toHaveBeenCalled();
    expect(complete).not.toHaveBeenCalled();
  });

  it("ignores updates without a text message", async () => {
    const result = await createRouter().routeUpdate({ update_id: 9 });

    expect(result).toEqual({ handled: false, reason: "no_text_message" });
  });
});
