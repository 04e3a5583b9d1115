// backend/services/location/src/app.ts
/**
 * Assembly order:
 *   requestId → httpLogger → parsers/CORS → health (open) → routes → 404 → error
 *
 * The app is built from explicit deps (store + services) so tests can run it
 * on the in-memory store and index.ts on Mongo.
 */

import express from "express";
import type { Express } from "express";
import { requestIdMiddleware } from "../../shared/middleware/requestId";
import { makeHttpLogger } from "../../shared/middleware/httpLogger";
import { coreMiddleware } from "../../shared/middleware/core";
import {
  errorProblemJson,
  notFoundProblemJson,
} from "../../shared/middleware/problemJson";
import { createHealthRouter } from "../../shared/health";
import type { LocationStore } from "./repo/location.store.types";
import { LocationUnitOfWork } from "./services/location.unitOfWork";
import { CountryWriteService } from "./services/country.write.service";
import { StateWriteService } from "./services/state.write.service";
import { CityWriteService } from "./services/city.write.service";
import { LocationReadService } from "./services/location.read.service";
import { countryHandlers } from "./controllers/country.controller";
import { stateHandlers } from "./controllers/state.controller";
import { cityHandlers } from "./controllers/city.controller";
import { eventLogHandlers } from "./controllers/eventLog.controller";
import { countryRouter } from "./routes/country.routes";
import { stateRouter } from "./routes/state.routes";
import { cityRouter } from "./routes/city.routes";
import { eventLogRouter } from "./routes/eventLog.routes";

export interface LocationServices {
  read: LocationReadService;
  countries: CountryWriteService;
  states: StateWriteService;
  cities: CityWriteService;
}

export function createLocationServices(store: LocationStore): LocationServices {
  const uow = new LocationUnitOfWork(store);
  return {
    read: new LocationReadService(store.reader),
    countries: new CountryWriteService(uow),
    states: new StateWriteService(uow),
    cities: new CityWriteService(uow),
  };
}

export interface CreateAppOptions {
  serviceName: string;
  store: LocationStore;
  services?: LocationServices;
  env?: string;
  corsOrigins?: string[];
  bodyLimit?: string;
}

const ROUTE_PREFIXES = ["/countries", "/states", "/cities", "/event-logs", "/health"];

export function createApp(opts: CreateAppOptions): Express {
  const { serviceName, store } = opts;
  const services = opts.services ?? createLocationServices(store);

  const app = express();
  app.disable("x-powered-by");

  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));
  app.use(...coreMiddleware({ corsOrigins: opts.corsOrigins, bodyLimit: opts.bodyLimit }));

  app.use(
    createHealthRouter({
      service: serviceName,
      env: opts.env,
      readiness: async () => {
        if (!(await store.isReady())) throw new Error("store not ready");
        return { store: "ok" };
      },
    })
  );

  // one-liners only
  app.use("/countries", countryRouter(countryHandlers(services)));
  app.use("/states", stateRouter(stateHandlers(services)));
  app.use("/cities", cityRouter(cityHandlers(services)));
  app.use("/event-logs", eventLogRouter(eventLogHandlers(services)));

  app.use(notFoundProblemJson(ROUTE_PREFIXES));
  app.use(errorProblemJson());

  return app;
}
