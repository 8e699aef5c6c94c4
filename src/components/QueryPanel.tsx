import React, { useState } from "react";
import { useQuery } from "../hooks/useQuery";
import { CitationPanel } from "./CitationPanel";

export const QueryPanel: React.FC = () => {
  const { result, error, running, runQuery } = useQuery();
  const [text, setText] = useState("");

  const submit = async () => {
    await runQuery(text);
  };

  return (
    <section className="space-y-4">
      <div className="space-y-2">
        <label htmlFor="query-input" className="text-sm font-semibold">
          Target details
        </label>
        <textarea
          id="query-input"
          value={text}
          onChange={(e) => setText(e.target.value)}
          onKeyDown={(e) => {
            if ((e.metaKey || e.ctrlKey) && e.key === "Enter") {
              e.preventDefault();
              void submit();
            }
          }}
          placeholder="Enter a domain, email address or organization name..."
          rows={4}
          className="w-full px-3 py-2 bg-background border border-input rounded-md text-sm"
        />
        <button
          type="button"
          onClick={() => void submit()}
          disabled={running}
          className="px-4 py-2 bg-primary text-primary-foreground rounded-md hover:bg-primary/90 text-sm font-medium disabled:opacity-50"
        >
          {running ? "Searching…" : "Find program"}
        </button>
      </div>

      {error ? (
        <div
          role="alert"
          className="bg-red-50 border border-red-200 text-red-700 px-4 py-2 rounded text-sm"
        >
          {error}
        </div>
      ) : null}

      {result ? (
        <div className="space-y-3">
          <h3 className="text-sm font-semibold">Result</h3>
          <pre className="whitespace-pre-wrap text-sm bg-muted rounded-md p-3">
            {result.text || "No output returned."}
          </pre>
          <CitationPanel citations={result.citations} />
        </div>
      ) : null}
    </section>
  );
};
