// backend/services/location/src/routes/country.routes.ts
import { Router } from "express";
import type { CountryHandlers } from "../controllers/country.controller";

/**
 * Policy:
 * - Create = POST /           (Mongo generates _id)
 * - Update = PATCH /:id       (partial)
 * - Delete = DELETE /:id      (returns the deleted row)
 * - Nested: /:id/states       (list + create under the country)
 */
export function countryRouter(h: CountryHandlers): Router {
  const router = Router();

  // one-liners only; no logic here
  router.get("/", h.list);
  router.post("/", h.create);
  router.get("/:id", h.findById);
  router.patch("/:id", h.update);
  router.delete("/:id", h.remove);

  router.get("/:id/states", h.listStates);
  router.post("/:id/states", h.createState);

  return router;
}
