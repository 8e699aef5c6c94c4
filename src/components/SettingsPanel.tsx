import React, { useEffect, useState } from "react";
import { toast } from "sonner";
import { useSession } from "../contexts/SessionContext";
import { hasCredential } from "../session/sessionState";

export const SettingsPanel: React.FC = () => {
  const { state, setCredential, setModel, endSession } = useSession();
  const [keyDraft, setKeyDraft] = useState("");
  const [modelDraft, setModelDraft] = useState(state.model);
  const keySet = hasCredential(state);

  useEffect(() => {
    setModelDraft(state.model);
  }, [state.model]);

  const saveKey = (e: React.FormEvent) => {
    e.preventDefault();
    setCredential(keyDraft);
    setKeyDraft("");
  };

  const handleEndSession = () => {
    endSession();
    setKeyDraft("");
    toast.info("Session cleared.");
  };

  return (
    <div className="space-y-2 pb-4 border-b border-border mb-4">
      <h3 className="text-sm font-semibold">Settings</h3>
      <p className="text-xs text-muted-foreground">Provide your OpenAI API key and preferred model.</p>
      <form onSubmit={saveKey} className="flex gap-2">
        <input
          type="password"
          aria-label="OpenAI API Key"
          placeholder={keySet ? "Key set (hidden)" : "sk-..."}
          value={keyDraft}
          onChange={(e) => setKeyDraft(e.target.value)}
          autoComplete="off"
          className="flex-1 px-3 py-2 bg-background border border-input rounded-md text-sm"
        />
        <button
          type="submit"
          disabled={!keyDraft.trim()}
          className="px-3 py-2 text-sm bg-primary text-primary-foreground rounded-md hover:bg-primary/90 disabled:opacity-50"
        >
          Save
        </button>
      </form>
      {keySet ? (
        <p className="text-xs text-green-700">API key set</p>
      ) : (
        <p className="text-xs text-amber-700">Set your API key to enable OpenAI features.</p>
      )}
      <label className="block space-y-1">
        <span className="text-sm font-semibold">Model</span>
        <input
          aria-label="Model"
          value={modelDraft}
          onChange={(e) => setModelDraft(e.target.value)}
          onBlur={() => setModel(modelDraft)}
          onKeyDown={(e) => {
            if (e.key === "Enter") setModel(modelDraft);
          }}
          className="w-full px-3 py-2 bg-background border border-input rounded-md text-sm"
        />
      </label>
      <button
        type="button"
        onClick={handleEndSession}
        className="text-xs px-3 py-1.5 rounded-md border border-border hover:bg-muted"
      >
        End session
      </button>
    </div>
  );
};
