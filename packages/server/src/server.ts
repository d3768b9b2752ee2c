import { createApp } from "./app.js";
import { readServerConfig } from "./config.js";
import { createPlanner } from "./services/planner.service.js";

const config = readServerConfig();
const planner = createPlanner({
  profileName: config.profileName,
  networkFile: config.networkFile,
});

const app = createApp(planner);

app.listen(config.port, () => {
  console.log(`\nTransfer planner API running at http://localhost:${config.port}`);
  console.log(`Stations: http://localhost:${config.port}/api/stations\n`);
});
