// backend/services/location/src/routes/city.routes.ts
import { Router } from "express";
import type { CityHandlers } from "../controllers/city.controller";

export function cityRouter(h: CityHandlers): Router {
  const router = Router();

  router.get("/", h.list); // ?stateId=&includeInactive=
  router.post("/", h.create);
  router.get("/:id", h.findById);
  router.patch("/:id", h.update);
  router.delete("/:id", h.remove);

  return router;
}
