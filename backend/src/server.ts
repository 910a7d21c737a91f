import "dotenv/config";

import { createApp } from "./app";
import { loadServiceConfig } from "./config";
import { ExcuseEmailService } from "./services/excuseEmailService";
import { ServingEndpointClient } from "./services/servingEndpointClient";

const config = loadServiceConfig();
const servingClient = new ServingEndpointClient(config);
const excuseEmailService = new ExcuseEmailService(servingClient);

const app = createApp({ config, generator: excuseEmailService });

app.listen(config.port, config.host, () => {
  console.log(
    JSON.stringify({
      event: "server_started",
      host: config.host,
      port: config.port,
      has_databricks_token: config.servingToken !== null,
      health_url: `http://localhost:${config.port}/health`,
      generate_url: `http://localhost:${config.port}/api/generate-excuse`,
    }),
  );
});
