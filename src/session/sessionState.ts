import type { StoreSummary } from "../types";
import { SecretValue } from "./secret";

export type SessionState = {
  credential: SecretValue;
  defaultModel: string;
  model: string;
  stores: StoreSummary[];
  activeStoreId: string | null;
};

export type SessionAction =
  | { type: "credential/set"; value: string }
  | { type: "model/set"; value: string }
  | { type: "stores/loaded"; stores: StoreSummary[] }
  | { type: "stores/created"; store: StoreSummary }
  | { type: "stores/deleted"; storeId: string }
  | { type: "active/set"; storeId: string | null }
  | { type: "session/ended" };

export const initialSessionState = (defaultModel: string): SessionState => ({
  credential: SecretValue.empty(),
  defaultModel,
  model: defaultModel,
  stores: [],
  activeStoreId: null,
});

export const sessionReducer = (state: SessionState, action: SessionAction): SessionState => {
  switch (action.type) {
    case "credential/set":
      return { ...state, credential: new SecretValue(action.value) };
    case "model/set": {
      const model = action.value.trim();
      return { ...state, model: model || state.defaultModel };
    }
    case "stores/loaded": {
      const stillListed = action.stores.some((s) => s.id === state.activeStoreId);
      return {
        ...state,
        stores: action.stores,
        activeStoreId: stillListed ? state.activeStoreId : null,
      };
    }
    case "stores/created": {
      const exists = state.stores.some((s) => s.id === action.store.id);
      return {
        ...state,
        stores: exists
          ? state.stores.map((s) => (s.id === action.store.id ? action.store : s))
          : [...state.stores, action.store],
        activeStoreId: action.store.id,
      };
    }
    case "stores/deleted":
      return {
        ...state,
        stores: state.stores.filter((s) => s.id !== action.storeId),
        activeStoreId: state.activeStoreId === action.storeId ? null : state.activeStoreId,
      };
    case "active/set":
      return { ...state, activeStoreId: action.storeId };
    case "session/ended":
      return initialSessionState(state.defaultModel);
  }
};

export const hasCredential = (state: SessionState) => !state.credential.isEmpty;

export const getStoreNames = (state: SessionState): Record<string, string> =>
  Object.fromEntries(state.stores.map((s) => [s.id, s.name]));

export const getActiveStore = (state: SessionState): StoreSummary | null =>
  state.stores.find((s) => s.id === state.activeStoreId) ?? null;
