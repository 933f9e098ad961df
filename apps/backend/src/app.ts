import cors from "cors";
import express from "express";
import { apiRouter } from "./routes";

export const buildApp = () => {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api", apiRouter);

  return app;
};
