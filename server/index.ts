import { createApp } from "./app";
import { loadConfig } from "./config";
import { log } from "./log";
import { services } from "./services";

const config = loadConfig();
const app = createApp(config, services);

app.listen(config.port, "0.0.0.0", () => {
  log(`serving on port ${config.port} (${config.env})`);
});
