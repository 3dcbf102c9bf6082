import process from "node:process";

import { createUserSettingsRepository } from "@contents-generator/shell";

import { createCliApplication } from "./cliApplication.js";
import { CommandRouter } from "./commandRouter.js";
import { createGenerateCommandDescriptor } from "./commands/generateCommand.js";
import { createSettingsCommandDescriptor } from "./commands/settingsCommand.js";
import { resolveAppConfig } from "./config/appConfig.js";
import { createNameGeneratorFactory } from "./config/nameGeneratorFactory.js";
import { createNodeProcessIO, registerProcessObservers } from "./runtime.js";

async function main(): Promise<void> {
  registerProcessObservers(process);

  const config = resolveAppConfig(process.env, process.platform);
  const settingsRepository = createUserSettingsRepository(config.dataDirectory);

  const router = new CommandRouter();
  router.register(
    createGenerateCommandDescriptor({
      nameGeneratorFactory: createNameGeneratorFactory(config.generation, settingsRepository),
      settingsRepository,
    })
  );
  router.register(
    createSettingsCommandDescriptor({
      settingsRepository,
      settingsLocation: config.dataDirectory,
    })
  );

  const app = createCliApplication({
    name: "contents-generator",
    description: "Contents Generator CLI",
    router,
  });

  const io = createNodeProcessIO(process);
  const exitCode = await app.run(process.argv, io);

  if (typeof process.exitCode !== "number") {
    process.exitCode = exitCode;
  }
}

main().catch((error: unknown) => {
  console.error("[cli] fatal error", error);
  process.exitCode = 1;
});
