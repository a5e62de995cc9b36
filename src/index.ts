import { appConfig } from "./config.js";
import { AppDatabase } from "./db.js";
import { leapRuleByName } from "./lib/leapYear.js";
import { createHttpServer } from "./server.js";
import { CalendarEngine } from "./services/calendar.js";
import { DateOperations } from "./services/operations.js";

async function main(): Promise<void> {
  const ops = new DateOperations({
    engine: new CalendarEngine(leapRuleByName(appConfig.leapRule))
  });
  const db = new AppDatabase(appConfig.dbPath, ops);

  const server = createHttpServer({
    config: appConfig,
    db
  });

  let shuttingDown = false;

  const stop = async () => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    console.log("Shutting down...");
    await server.close();
    db.close();
    process.exit(0);
  };

  process.once("SIGINT", () => {
    void stop();
  });
  process.once("SIGTERM", () => {
    void stop();
  });

  await server.listen({
    port: appConfig.port,
    host: appConfig.host
  });

  console.log(`Date functions ready (leap rule: ${appConfig.leapRule}, today: ${ops.now()})`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
