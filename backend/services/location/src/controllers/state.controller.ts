// backend/services/location/src/controllers/state.controller.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { logger } from "../../../shared/utils/logger";
import type { StateWriteService } from "../services/state.write.service";
import type { LocationReadService } from "../services/location.read.service";
import {
  citiesOfStateQuery,
  createStateDto,
  idParams,
  listStatesQuery,
  updateStateDto,
} from "../validators/location.dto";
import { buildRequestInfo, sendDomainError } from "./http";

export interface StateControllerDeps {
  read: LocationReadService;
  states: StateWriteService;
}

export interface StateHandlers {
  list: RequestHandler;
  findById: RequestHandler;
  create: RequestHandler;
  update: RequestHandler;
  remove: RequestHandler;
  listCities: RequestHandler;
}

export function stateHandlers(deps: StateControllerDeps): StateHandlers {
  const { read, states } = deps;

  return {
    async list(req: Request, res: Response, next: NextFunction) {
      try {
        const { countryId, ...page } = listStatesQuery.parse(req.query);
        res.json(await read.listStates({ countryId }, page));
      } catch (err) {
        next(err);
      }
    },

    async findById(req: Request, res: Response, next: NextFunction) {
      try {
        const { id } = idParams.parse(req.params);
        const result = await read.getState(id);
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
      logger.debug({ requestId: req.requestId }, "[location.state.create] enter");
      try {
        const dto = createStateDto.parse(req.body);
        const result = await states.create(dto, buildRequestInfo(req, 201, dto));
        if (!result.ok) {
          sendDomainError(req, res, result.error);
          return;
        }
        logger.debug(
          { requestId: req.requestId, id: result.value.id },
          "[location.state.create] exit"
        );
        res.status(201).json(result.value);
      } catch (err) {
        next(err);
      }
    },

    async update(req: Request, res: Response, next: NextFunction) {
      logger.debug({ requestId: req.requestId }, "[location.state.update] enter");
      try {
        const { id } = idParams.parse(req.params);
        const dto = updateStateDto.parse(req.body);
        const result = await states.update(id, dto, buildRequestInfo(req, 200, dto));
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
      logger.debug({ requestId: req.requestId }, "[location.state.remove] enter");
      try {
        const { id } = idParams.parse(req.params);
        const result = await states.delete(id, buildRequestInfo(req, 200));
        if (!result.ok) {
          sendDomainError(req, res, result.error);
          return;
        }
        res.json(result.value);
      } catch (err) {
        next(err);
      }
    },

    async listCities(req: Request, res: Response, next: NextFunction) {
      try {
        const { id } = idParams.parse(req.params);
        const { includeInactive, ...page } = citiesOfStateQuery.parse(req.query);
        const result = await read.listCitiesOfState(id, page, includeInactive);
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
