import { escapeHtml } from "@/telegram/format";

export const renderStartHtml = (firstName: string) =>
  [
    `Hi <b>${escapeHtml(firstName)}</b>, I'm <b>Will</b>, an AI assistant! 👋`,
    "",
    "To use me, you must first provide your OpenRouter API key.",
    "",
    "Use the command:",
    "<code>/setkey YOUR_API_KEY</code>",
    "",
    "Your key will only be used to process your requests. " +
      "For security, the message containing your key will be deleted immediately.",
  ].join("\n");

export const renderKeyPreviewHtml = (preview: string) =>
  `You have an API key set: <code>${escapeHtml(preview)}</code>`;

export const REPLY_TEXT = {
  setKeyUsage: "Error: You must provide a key.\nUsage: /setkey <your_api_key>",
  keySavedAndDeleted:
    "✅ OpenRouter API key saved successfully! " +
    "Your original message has been deleted for security.\n\n" +
    "Now you can start chatting.",
  keySavedDeleteManually:
    "✅ OpenRouter API key saved! " +
    "(I couldn't delete your original message, please delete it manually).",
  noKeyToShow: "You haven't set an API key yet. Use /setkey <your_key>.",
  keyRemoved: "🗑️ Your API key has been removed.",
  noKeyToRemove: "You don't have an API key to remove.",
  setKeyFirst:
    "You must set your OpenRouter API key first. Use the command: /setkey <your_api_key>",
  invalidKey:
    "😔 Your OpenRouter API key seems to be incorrect or invalid. Please try again with /setkey",
  genericFailure: "😔 Sorry, an error occurred. Please try again later.",
} as const;
