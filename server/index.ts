import { createServer } from "http";

import { getServerPort, initTemplateRegistry } from "../inventory";
import { createApp } from "./app";

async function startServer() {
  // Load templates before accepting requests; a broken data package fails startup
  const registry = initTemplateRegistry();
  const app = createApp({ registry });
  const server = createServer(app);

  const port = getServerPort();

  server.listen(port, () => {
    console.log(`Server running on http://localhost:${port}/`);
  });
}

startServer().catch((error: unknown) => {
  console.error("Server failed to start:", error);
  process.exitCode = 1;
});
