import "reflect-metadata";

import { ValidationPipe } from "@nestjs/common";
import type { INestApplication } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import morgan from "morgan";

import { AppModule } from "./app.module.js";
import { loadConfig, logLevelsFor } from "./config.js";
import type { AppConfig } from "./config.js";
import { PipelineExceptionFilter } from "./filters/pipeline-exception.filter.js";
import { APP_CONFIG } from "./tokens.js";

/** Global pipes and filters shared by the server and the HTTP tests. */
export function configureApp<T extends INestApplication>(app: T): T {
  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    transform: true,
    transformOptions: { enableImplicitConversion: true },
  }));
  app.useGlobalFilters(new PipelineExceptionFilter());
  return app;
}

async function bootstrap() {
  const { logLevel } = loadConfig();
  const app = await NestFactory.create(AppModule, { logger: logLevelsFor(logLevel) });
  app.use(morgan("tiny"));
  configureApp(app);
  app.enableShutdownHooks();

  const config = app.get<AppConfig>(APP_CONFIG);
  await app.listen(config.port);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch((error) => {
    // eslint-disable-next-line no-console
    console.error("Failed to bootstrap media pipeline", error);
    process.exitCode = 1;
  });
}
