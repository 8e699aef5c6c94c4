import React, { createContext, useCallback, useContext, useMemo, useReducer } from "react";
import type { AppConfig } from "../config";
import { createOpenAIClient } from "../services/openaiClient";
import type { OpenAIClient } from "../services/openaiClient";
import { hasCredential, initialSessionState, sessionReducer } from "../session/sessionState";
import type { SessionState } from "../session/sessionState";
import type { StoreSummary } from "../types";

type SessionContextValue = {
  config: AppConfig;
  state: SessionState;
  client: OpenAIClient | null;
  setCredential: (value: string) => void;
  setModel: (value: string) => void;
  setActiveStore: (storeId: string | null) => void;
  storesLoaded: (stores: StoreSummary[]) => void;
  storeCreated: (store: StoreSummary) => void;
  storeDeleted: (storeId: string) => void;
  endSession: () => void;
};

const SessionContext = createContext<SessionContextValue | null>(null);

export const SessionProvider: React.FC<{
  config: AppConfig;
  fetchImpl?: typeof fetch;
  children: React.ReactNode;
}> = ({ config, fetchImpl, children }) => {
  const [state, dispatch] = useReducer(sessionReducer, config.defaultModel, initialSessionState);

  const client = useMemo(
    () =>
      hasCredential(state)
        ? createOpenAIClient({
            credential: state.credential,
            baseUrl: config.openaiBaseUrl,
            timeoutMs: config.requestTimeoutMs,
            fetchImpl,
          })
        : null,
    [state.credential, config.openaiBaseUrl, config.requestTimeoutMs, fetchImpl],
  );

  const setCredential = useCallback((value: string) => dispatch({ type: "credential/set", value }), []);
  const setModel = useCallback((value: string) => dispatch({ type: "model/set", value }), []);
  const setActiveStore = useCallback(
    (storeId: string | null) => dispatch({ type: "active/set", storeId }),
    [],
  );
  const storesLoaded = useCallback((stores: StoreSummary[]) => dispatch({ type: "stores/loaded", stores }), []);
  const storeCreated = useCallback((store: StoreSummary) => dispatch({ type: "stores/created", store }), []);
  const storeDeleted = useCallback((storeId: string) => dispatch({ type: "stores/deleted", storeId }), []);
  const endSession = useCallback(() => {
    state.credential.clear();
    dispatch({ type: "session/ended" });
  }, [state.credential]);

  const value = useMemo(
    () => ({
      config,
      state,
      client,
      setCredential,
      setModel,
      setActiveStore,
      storesLoaded,
      storeCreated,
      storeDeleted,
      endSession,
    }),
    [
      config,
      state,
      client,
      setCredential,
      setModel,
      setActiveStore,
      storesLoaded,
      storeCreated,
      storeDeleted,
      endSession,
    ],
  );

  return <SessionContext.Provider value={value}>{children}</SessionContext.Provider>;
};

export const useSession = () => {
  const ctx = useContext(SessionContext);
  if (!ctx) {
    throw new Error("useSession must be used within a SessionProvider");
  }
  return ctx;
};
