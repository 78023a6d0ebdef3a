import type { Express, Request } from "express";
import { fileURLToPath } from "url";
import {
  eventQuerySchema,
  filterOptionsQuerySchema,
  subscribeQuerySchema,
  toEventJson,
} from "@shared/schema";
import { calendarNameFor, generateIcal, generateWebcalUrl } from "./calendar";
import type { EventService } from "./eventService";
import type { RefreshOrchestrator } from "./refreshOrchestrator";

export interface RouteDeps {
  events: EventService;
  refresher: RefreshOrchestrator;
  calendarTtlMinutes: number;
}

const HOME_PAGE = fileURLToPath(new URL("./public/index.html", import.meta.url));

function requestBaseUrl(req: Request) {
  return `${req.protocol}://${req.get("host") ?? "localhost"}`;
}

export function registerRoutes(app: Express, deps: RouteDeps) {
  const { events, refresher } = deps;

  app.get("/", (_req, res) => {
    res.sendFile(HOME_PAGE);
  });

  app.get("/calendar.ics", async (req, res, next) => {
    try {
      const query = eventQuerySchema.parse(req.query);
      await refresher.maybeRefresh();
      const list = await events.getEvents(query);
      const body = generateIcal(list, {
        calendarName: calendarNameFor(query),
        ttlMinutes: deps.calendarTtlMinutes,
      });

      res
        .status(200)
        .set({
          "Content-Type": "text/calendar; charset=utf-8",
          "Content-Disposition": "attachment; filename=smoothcomp.ics",
        })
        .send(body);
    } catch (error) {
      next(error);
    }
  });

  app.get("/events", async (req, res, next) => {
    try {
      const query = eventQuerySchema.parse(req.query);
      await refresher.maybeRefresh();
      const list = await events.getEvents(query);
      res.json({
        count: list.length,
        filters: { country: query.country ?? null, sport: query.sport ?? null },
        events: list.map(toEventJson),
      });
    } catch (error) {
      next(error);
    }
  });

  app.get("/countries", async (_req, res, next) => {
    try {
      const countries = await events.getCountries();
      res.json({ total: countries.length, countries });
    } catch (error) {
      next(error);
    }
  });

  app.get("/sports", async (_req, res, next) => {
    try {
      const sports = await events.getSports();
      res.json({ total: sports.length, sports });
    } catch (error) {
      next(error);
    }
  });

  app.get("/filter-options", async (req, res, next) => {
    try {
      const query = filterOptionsQuerySchema.parse(req.query);
      res.json(await events.getFilterOptions(query));
    } catch (error) {
      next(error);
    }
  });

  app.get("/status", async (_req, res, next) => {
    try {
      res.json(await events.getStatus());
    } catch (error) {
      next(error);
    }
  });

  app.get("/subscribe", (req, res, next) => {
    try {
      const query = subscribeQuerySchema.parse(req.query);
      const httpUrl = `${requestBaseUrl(req)}/calendar.ics`;
      res.json({ httpUrl, webcalUrl: generateWebcalUrl(httpUrl, query) });
    } catch (error) {
      next(error);
    }
  });

  app.post("/refresh", (_req, res) => {
    const started = refresher.tryStartRefresh();
    res.status(202).json({ started });
  });
}
