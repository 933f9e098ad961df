import { Router } from "express";
import { simulationController } from "../controllers/simulationController";

const router = Router();

router.get("/state", simulationController.getSnapshot);
router.get("/render", simulationController.render);
router.get("/path", simulationController.findPath);
router.post("/step", simulationController.step);
router.post("/reset", simulationController.reset);
router.post("/clock", simulationController.setClock);
router.post("/vehicles/:id/route", simulationController.assignRoute);

export { router as simulationRoutes };
