import type { CredentialStore } from "@/credentials/store";
import type { KeyPreview, KeyRemoval } from "@/types/contracts";

const PREVIEW_EDGE_LENGTH = 4;
const FULLY_MASKED_PREVIEW = "****";

export const maskApiKey = (apiKey: string) => {
  if (apiKey.length < PREVIEW_EDGE_LENGTH * 2) {
    return FULLY_MASKED_PREVIEW;
  }
  return `${apiKey.slice(0, PREVIEW_EDGE_LENGTH)}...${apiKey.slice(-PREVIEW_EDGE_LENGTH)}`;
};

export type CredentialService = {
  setKey: (userId: string, apiKey: string) => Promise<void>;
  getPreview: (userId: string) => Promise<KeyPreview>;
  deleteKey: (userId: string) => Promise<KeyRemoval>;
};

export const createCredentialService = (store: CredentialStore): CredentialService => ({
  setKey: (userId, apiKey) => store.set(userId, apiKey),
  getPreview: async (userId) => {
    const apiKey = await store.get(userId);
    if (apiKey === null) {
      return { status: "missing" };
    }
    return { status: "set", preview: maskApiKey(apiKey) };
  },
  deleteKey: async (userId) => ({
    removed: await store.delete(userId),
  }),
});
