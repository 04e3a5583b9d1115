// backend/services/location/src/controllers/city.controller.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { logger } from "../../../shared/utils/logger";
import type { CityWriteService } from "../services/city.write.service";
import type { LocationReadService } from "../services/location.read.service";
import {
  createCityDto,
  idParams,
  includeInactiveQuery,
  listCitiesQuery,
  updateCityDto,
} from "../validators/location.dto";
import { buildRequestInfo, sendDomainError } from "./http";

export interface CityControllerDeps {
  read: LocationReadService;
  cities: CityWriteService;
}

export interface CityHandlers {
  list: RequestHandler;
  findById: RequestHandler;
  create: RequestHandler;
  update: RequestHandler;
  remove: RequestHandler;
}

/** `?includeInactive=true` widens get/list/update/delete to inactive rows. */
export function cityHandlers(deps: CityControllerDeps): CityHandlers {
  const { read, cities } = deps;

  return {
    async list(req: Request, res: Response, next: NextFunction) {
      try {
        const { stateId, includeInactive, ...page } = listCitiesQuery.parse(req.query);
        res.json(await read.listCities({ stateId, includeInactive }, page));
      } catch (err) {
        next(err);
      }
    },

    async findById(req: Request, res: Response, next: NextFunction) {
      try {
        const { id } = idParams.parse(req.params);
        const { includeInactive } = includeInactiveQuery.parse(req.query);
        const result = await read.getCity(id, { includeInactive });
        if (!result.ok) {
          sendDomainError(req, res, result.error);
          return;
        }
        res.json(result.value);
      } catch (err) {
        next(err);
      }
    },

    async create(req: Request, res: Response, next: NextFunction) {
      logger.debug({ requestId: req.requestId }, "[location.city.create] enter");
      try {
        const dto = createCityDto.parse(req.body);
        const result = await cities.create(dto, buildRequestInfo(req, 201, dto));
        if (!result.ok) {
          sendDomainError(req, res, result.error);
          return;
        }
        logger.debug(
          { requestId: req.requestId, id: result.value.id },
          "[location.city.create] exit"
        );
        res.status(201).json(result.value);
      } catch (err) {
        next(err);
      }
    },

    async update(req: Request, res: Response, next: NextFunction) {
      logger.debug({ requestId: req.requestId }, "[location.city.update] enter");
      try {
        const { id } = idParams.parse(req.params);
        const { includeInactive } = includeInactiveQuery.parse(req.query);
        const dto = updateCityDto.parse(req.body);
        const result = await cities.update(id, dto, buildRequestInfo(req, 200, dto), {
          includeInactive,
        });
        if (!result.ok) {
          sendDomainError(req, res, result.error);
          return;
        }
        res.json(result.value);
      } catch (err) {
        next(err);
      }
    },

    async remove(req: Request, res: Response, next: NextFunction) {
      logger.debug({ requestId: req.requestId }, "[location.city.remove] enter");
      try {
        const { id } = idParams.parse(req.params);
        const { includeInactive } = includeInactiveQuery.parse(req.query);
        const result = await cities.delete(id, buildRequestInfo(req, 200), {
          includeInactive,
        });
        if (!result.ok) {
          sendDomainError(req, res, result.error);
          return;
        }
        res.json(result.value);
      } catch (err) {
        next(err);
      }
    },
  };
}
