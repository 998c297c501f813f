import express, { type Request, type Response } from "express";
import { once } from "node:events";
import { z } from "zod";
import { strongerThan, type Beer } from "./beer";
import { FetchError } from "./errors";
import type { Logger } from "./logger";
import { paginateWhere, type PageFetcher } from "./paginate";

export type AppOptions = {
  fetchPage: PageFetcher<Beer>;
  minAbv: number;
  maxPages?: number;
  logger: Logger;
};

// `?minAbv=` with no value means the configured default
const beersQuerySchema = z.object({
  minAbv: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.coerce.number().finite().optional(),
  ),
});

export function createApp(options: AppOptions): express.Express {
  const app = express();

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/beers", (req, res, next) => {
    streamBeers(req, res, options).catch(next);
  });

  return app;
}

/**
 * Writes the filtered beers as a JSON array, one element per record as the
 * pipeline produces it. The status line goes out with the first record, so a
 * failure before that still gets an error status.
 */
async function streamBeers(
  req: Request,
  res: Response,
  options: AppOptions,
): Promise<void> {
  const query = beersQuerySchema.safeParse(req.query);
  if (!query.success) {
    res.status(400).json({ error: "Invalid query", issues: query.error.issues });
    return;
  }

  const minAbv = query.data.minAbv ?? options.minAbv;
  const log = options.logger.child({ route: "/beers", minAbv });

  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });

  const beers = paginateWhere(options.fetchPage, strongerThan(minAbv), {
    maxPages: options.maxPages,
    signal: controller.signal,
    hooks: {
      onPage: ({ page }) => log.debug({ page }, "Fetching page"),
      onPageFetched: ({ page, items }) =>
        log.debug({ page, items }, "Page fetched"),
      onError: (err, { page }) =>
        log.error({ err, page }, "Page fetch failed"),
      onMaxPages: ({ pages }) =>
        log.warn({ pages }, "Page limit reached before the listing ended"),
    },
  });

  let written = 0;
  try {
    await beers
      .map((beer) => JSON.stringify(beer))
      .forEach(async (json, index) => {
        if (index === 0) res.status(200).type("application/json");
        written = index + 1;
        if (!res.write((index === 0 ? "[" : ",") + json)) {
          await once(res, "drain", { signal: controller.signal });
        }
      });
  } catch (error) {
    if (controller.signal.aborted) {
      log.info({ written }, "Client disconnected");
      return;
    }
    if (!res.headersSent) {
      const status = error instanceof FetchError ? 502 : 500;
      const message = error instanceof Error ? error.message : String(error);
      res.status(status).json({ error: message });
      return;
    }
    log.error({ err: error, written }, "Aborting response mid-stream");
    res.destroy(error instanceof Error ? error : undefined);
    return;
  }

  if (controller.signal.aborted) {
    log.info({ written }, "Client disconnected");
    return;
  }

  if (written === 0) {
    res.status(200).type("application/json").end("[]");
  } else {
    res.end("]");
  }
  log.info({ written }, "Response complete");
}
