import { Router } from "express";
import { simulationRoutes } from "./simulationRoutes";

const router = Router();

router.use("/simulation", simulationRoutes);

export { router as apiRouter };
