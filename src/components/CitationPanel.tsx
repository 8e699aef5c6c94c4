import React from "react";
import type { Citation } from "../types";

export const citationLabel = (c: Citation) => `${c.filename ?? "(unknown)"} [${c.fileId}]`;

export const CitationPanel: React.FC<{ citations: Citation[] }> = ({ citations }) => {
  if (!citations.length) return null;
  return (
    <aside>
      <h4 className="text-sm font-semibold mb-2">Sources</h4>
      <ul className="space-y-2">
        {citations.map((c, idx) => (
          <li key={c.fileId} className="text-sm p-3 rounded-md border border-border bg-muted">
            <p className="font-medium">
              [{idx + 1}] {citationLabel(c)}
            </p>
          </li>
        ))}
      </ul>
    </aside>
  );
};
