import { useCallback, useState } from "react";
import { toast } from "sonner";
import { useSession } from "../contexts/SessionContext";
import { describeError } from "../errors";
import { dispatchQuery } from "../services/query";
import type { QueryResult } from "../types";

export const useQuery = () => {
  const { client, config, state } = useSession();
  const [result, setResult] = useState<QueryResult | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [running, setRunning] = useState(false);

  const runQuery = useCallback(
    async (text: string) => {
      setRunning(true);
      setError(null);
      setResult(null);
      try {
        const answer = await dispatchQuery({
          client,
          text,
          storeId: state.activeStoreId,
          model: state.model,
          instructions: config.queryInstructions,
        });
        setResult(answer);
        return answer;
      } catch (err) {
        const message = describeError(err);
        setError(message);
        toast.error(message, { id: "query-error" });
        return null;
      } finally {
        setRunning(false);
      }
    },
    [client, config.queryInstructions, state.activeStoreId, state.model],
  );

  return { result, error, running, runQuery };
};
