import { APP_NAME } from "@chamapool/shared";
import { env } from "./config/env.js";
import { createApp } from "./app.js";
import { createServices } from "./domain/index.js";
import { systemClock } from "./utils/time.js";

const services = createServices(systemClock, (event) => {
  // eslint-disable-next-line no-console
  console.log(`[${event.groupId}] #${event.id} ${event.type}`);
});
const app = createApp(services);

app.listen(env.API_PORT, () => {
  // eslint-disable-next-line no-console
  console.log(`${APP_NAME} API listening on port ${env.API_PORT}`);
});
