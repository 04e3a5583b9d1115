// backend/services/location/src/controllers/country.controller.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { logger } from "../../../shared/utils/logger";
import type { CountryWriteService } from "../services/country.write.service";
import type { StateWriteService } from "../services/state.write.service";
import type { LocationReadService } from "../services/location.read.service";
import {
  createCountryDto,
  createStateUnderCountryDto,
  idParams,
  paginationQuery,
  updateCountryDto,
} from "../validators/location.dto";
import { buildRequestInfo, sendDomainError } from "./http";

export interface CountryControllerDeps {
  read: LocationReadService;
  countries: CountryWriteService;
  states: StateWriteService;
}

export interface CountryHandlers {
  list: RequestHandler;
  findById: RequestHandler;
  create: RequestHandler;
  update: RequestHandler;
  remove: RequestHandler;
  listStates: RequestHandler;
  createState: RequestHandler;
}

export function countryHandlers(deps: CountryControllerDeps): CountryHandlers {
  const { read, countries, states } = deps;

  return {
    async list(req: Request, res: Response, next: NextFunction) {
      try {
        const page = paginationQuery.parse(req.query);
        res.json(await read.listCountries(page));
      } catch (err) {
        next(err);
      }
    },

    async findById(req: Request, res: Response, next: NextFunction) {
      try {
        const { id } = idParams.parse(req.params);
        const result = await read.getCountry(id);
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
      logger.debug({ requestId: req.requestId }, "[location.country.create] enter");
      try {
        const dto = createCountryDto.parse(req.body);
        const result = await countries.create(dto, buildRequestInfo(req, 201, dto));
        if (!result.ok) {
          sendDomainError(req, res, result.error);
          return;
        }
        logger.debug(
          { requestId: req.requestId, id: result.value.id },
          "[location.country.create] exit"
        );
        res.status(201).json(result.value);
      } catch (err) {
        next(err);
      }
    },

    async update(req: Request, res: Response, next: NextFunction) {
      logger.debug({ requestId: req.requestId }, "[location.country.update] enter");
      try {
        const { id } = idParams.parse(req.params);
        const dto = updateCountryDto.parse(req.body);
        const result = await countries.update(id, dto, buildRequestInfo(req, 200, dto));
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
      logger.debug({ requestId: req.requestId }, "[location.country.remove] enter");
      try {
        const { id } = idParams.parse(req.params);
        const result = await countries.delete(id, buildRequestInfo(req, 200));
        if (!result.ok) {
          sendDomainError(req, res, result.error);
          return;
        }
        res.json(result.value);
      } catch (err) {
        next(err);
      }
    },

    async listStates(req: Request, res: Response, next: NextFunction) {
      try {
        const { id } = idParams.parse(req.params);
        const page = paginationQuery.parse(req.query);
        const result = await read.listStatesOfCountry(id, page);
        if (!result.ok) {
          sendDomainError(req, res, result.error);
          return;
        }
        res.json(result.value);
      } catch (err) {
        next(err);
      }
    },

    async createState(req: Request, res: Response, next: NextFunction) {
      logger.debug({ requestId: req.requestId }, "[location.country.createState] enter");
      try {
        const { id } = idParams.parse(req.params);
        const dto = createStateUnderCountryDto.parse(req.body);
        const input = { ...dto, countryId: id };
        const result = await states.create(input, buildRequestInfo(req, 201, input));
        if (!result.ok) {
          sendDomainError(req, res, result.error);
          return;
        }
        res.status(201).json(result.value);
      } catch (err) {
        next(err);
      }
    },
  };
}
