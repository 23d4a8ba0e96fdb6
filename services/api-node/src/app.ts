import cors from "cors";
import express from "express";
import helmet from "helmet";
import morgan from "morgan";
import { APP_NAME } from "@chamapool/shared";
import { env } from "./config/env.js";
import { createServices, type DomainServices } from "./domain/index.js";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.js";
import { createV1Router } from "./routes/v1.js";

export function createApp(services: DomainServices = createServices()) {
  const app = express();
  app.use(
    cors({
      origin: true,
      credentials: true,
    })
  );
  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));
  if (env.NODE_ENV !== "test") {
    app.use(morgan("dev"));
  }

  app.get("/", (_request, response) => {
    response.json({
      data: {
        name: `${APP_NAME} API`,
        version: "v1",
      },
    });
  });

  app.use("/v1", createV1Router(services));
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
