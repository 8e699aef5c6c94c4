import { useMemo } from "react";
import { Toaster } from "sonner";
import { AppLayout } from "./components/layout/AppLayout";
import { getAppConfig } from "./config";
import type { AppConfig } from "./config";
import { SessionProvider } from "./contexts/SessionContext";
import { StoreProvider } from "./contexts/StoreContext";

type AppProps = {
  config?: AppConfig;
  fetchImpl?: typeof fetch;
};

export default function App({ config, fetchImpl }: AppProps) {
  const resolvedConfig = useMemo(() => config ?? getAppConfig(), [config]);
  return (
    <>
      <Toaster richColors position="top-center" />
      <SessionProvider config={resolvedConfig} fetchImpl={fetchImpl}>
        <StoreProvider>
          <AppLayout />
        </StoreProvider>
      </SessionProvider>
    </>
  );
}
