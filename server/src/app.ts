import express from "express";
import cors from "cors";
import { definitionsRouter } from "./routes/definitions";
import { validationRouter } from "./routes/validation";
import { charactersRouter } from "./routes/characters";

export function createApp() {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api/definitions", definitionsRouter);
  app.use("/api/validation", validationRouter);
  app.use("/api/characters", charactersRouter);

  return app;
}
