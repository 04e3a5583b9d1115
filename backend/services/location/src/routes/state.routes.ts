// backend/services/location/src/routes/state.routes.ts
import { Router } from "express";
import type { StateHandlers } from "../controllers/state.controller";

export function stateRouter(h: StateHandlers): Router {
  const router = Router();

  router.get("/", h.list); // ?countryId=
  router.post("/", h.create);
  router.get("/:id", h.findById);
  router.patch("/:id", h.update);
  router.delete("/:id", h.remove);

  router.get("/:id/cities", h.listCities);

  return router;
}
