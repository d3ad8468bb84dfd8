// backend/services/hero/src/routes/heroRoutes.ts
import {
  Router,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import type { z, ZodTypeAny } from "zod";
import { zodBadRequest } from "../../../shared/contracts/common";
import {
  zHero,
  zHeroIdParams,
  zHeroSearchQuery,
} from "../contracts/hero";
import type {
  HandlerResult,
  HeroController,
} from "../controllers/hero/HeroController";

type Op = (req: Request, res: Response) => Promise<void>;

/** Bodiless results (404, 409, 500, delete's 200) go out with an empty body. */
function send<T>(res: Response, result: HandlerResult<T>) {
  if (result.body === undefined) {
    res.status(result.status).end();
    return;
  }
  res.status(result.status).json(result.body);
}

/** Parses `input`; on failure answers 400 Problem+JSON and returns undefined. */
function parseOr400<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  req: Request,
  res: Response
): z.output<S> | undefined {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;
  zodBadRequest(req, res, parsed.error);
  return undefined;
}

function wrap(op: Op) {
  return (req: Request, res: Response, next: NextFunction) => {
    op(req, res).catch(next);
  };
}

/**
 * /heroes routes. GET /heroes and GET /heroes/ share one route: `?name=`
 * selects search, no `name` selects list.
 */
export function createHeroRouter(controller: HeroController): Router {
  const router = Router();

  router.get(
    "/",
    wrap(async (req, res) => {
      const query = parseOr400(zHeroSearchQuery, req.query, req, res);
      if (!query) return;
      if (query.name !== undefined) {
        send(res, await controller.search(query.name));
      } else {
        send(res, await controller.list(req.get("x-api-version")));
      }
    })
  );

  router.get(
    "/:id",
    wrap(async (req, res) => {
      const params = parseOr400(zHeroIdParams, req.params, req, res);
      if (!params) return;
      send(res, await controller.get(params.id));
    })
  );

  router.post(
    "/",
    wrap(async (req, res) => {
      const hero = parseOr400(zHero, req.body, req, res);
      if (!hero) return;
      send(res, await controller.create(hero));
    })
  );

  router.put(
    "/",
    wrap(async (req, res) => {
      const hero = parseOr400(zHero, req.body, req, res);
      if (!hero) return;
      send(res, await controller.update(hero));
    })
  );

  router.delete(
    "/:id",
    wrap(async (req, res) => {
      const params = parseOr400(zHeroIdParams, req.params, req, res);
      if (!params) return;
      send(res, await controller.delete(params.id));
    })
  );

  return router;
}
