import express, { type Express, type Response } from "express";

import {
  CloudProvider,
  CycleRunConfig,
  InventoryError,
  computeInventoryDigest,
  forecastHourSetsFor,
  formatCollectionId,
  formatInventoryKey,
  formatItemId,
  getTemplateRegistry,
  parseCloudProvider,
  parseForecastHourSet,
  parseProduct,
  parseRegion,
  validateForecastRequest,
  type ForecastHourSet,
  type Product,
  type Region,
  type TemplateRegistry,
} from "../inventory";

// Inventories only change with a deploy of the packaged data
const CACHE_INVENTORY = "public, max-age=3600";
const CACHE_ERROR = "no-store";

const FORECAST_HOUR_PATTERN = /^\d+$/;
const UTC_OFFSET_PATTERN = /(?:Z|[+-]\d{2}:\d{2})$/i;

export interface AppOptions {
  /** Defaults to the shared registry, loaded when the app is created. */
  registry?: TemplateRegistry;
}

type BuiltInventory = { config: CycleRunConfig; digest: string };

function sendError(res: Response, status: number, error: string, message: string): void {
  res.status(status).set("Cache-Control", CACHE_ERROR).json({ error, message });
}

function statusForInventoryError(error: InventoryError): number {
  switch (error.code) {
    case "MISSING_REGISTRY_ENTRY":
      return 404;
    case "TEMPLATE_DATA_INVALID":
    case "TEMPLATE_PARSE_FAILED":
      return 500;
    default:
      return 400;
  }
}

function handleError(res: Response, route: string, error: unknown): void {
  if (error instanceof InventoryError) {
    const status = statusForInventoryError(error);
    if (status >= 500) {
      console.error(`[api] ${route} failed`, { code: error.code, message: error.message });
    }
    sendError(res, status, error.code, error.message);
    return;
  }
  console.error(`[api] ${route} failed`, error);
  const message = error instanceof Error ? error.message : String(error);
  sendError(res, 500, "INTERNAL_ERROR", message);
}

export function createApp(options: AppOptions = {}): Express {
  const registry = options.registry ?? getTemplateRegistry();
  const app = express();

  // Registry is immutable, so an expanded inventory never goes stale
  const built = new Map<string, BuiltInventory>();
  const buildInventory = (region: Region, product: Product, forecastHourSet: ForecastHourSet): BuiltInventory => {
    const key = formatInventoryKey({ region, product, forecastHourSet });
    let entry = built.get(key);
    if (!entry) {
      const config = new CycleRunConfig(region, product, forecastHourSet, registry);
      entry = { config, digest: computeInventoryDigest(config) };
      built.set(key, entry);
    }
    return entry;
  };

  app.get("/api/inventory/:region/:product/:forecastHourSet", (req, res) => {
    try {
      const region = parseRegion(req.params.region);
      const product = parseProduct(req.params.product);
      const forecastHourSet = parseForecastHourSet(req.params.forecastHourSet);

      if (!forecastHourSetsFor(product).includes(forecastHourSet)) {
        sendError(
          res,
          404,
          "UNKNOWN_INVENTORY",
          `Product ${product} has no ${forecastHourSet} inventory (expected ${forecastHourSetsFor(product).join(", ")})`
        );
        return;
      }

      const { config, digest } = buildInventory(region, product, forecastHourSet);
      const etag = `"${digest}"`;
      res.set("ETag", etag);
      res.set("Cache-Control", CACHE_INVENTORY);

      if (req.get("If-None-Match") === etag) {
        res.status(304).end();
        return;
      }

      res.json({
        collectionId: formatCollectionId({ region, product, forecastHourSet }),
        region,
        product,
        forecastHourSet,
        digest,
        forecastHours: Object.fromEntries(config.inventory),
      });
    } catch (error) {
      handleError(res, "inventory", error);
    }
  });

  app.get("/api/items/:region/:product", (req, res) => {
    try {
      const region = parseRegion(req.params.region);
      const product = parseProduct(req.params.product);

      const referenceTimeRaw = typeof req.query.referenceTime === "string" ? req.query.referenceTime.trim() : "";
      const forecastHourRaw = typeof req.query.forecastHour === "string" ? req.query.forecastHour.trim() : "";
      const cloudProviderRaw = typeof req.query.cloudProvider === "string" ? req.query.cloudProvider : CloudProvider.azure;

      if (!referenceTimeRaw || !forecastHourRaw) {
        sendError(res, 400, "INVALID_QUERY", "referenceTime and forecastHour are required");
        return;
      }
      if (!FORECAST_HOUR_PATTERN.test(forecastHourRaw)) {
        sendError(res, 400, "INVALID_QUERY", `forecastHour must be a whole number of hours, got ${forecastHourRaw}`);
        return;
      }
      // Without an offset, Date reads the time in the host's zone
      if (!UTC_OFFSET_PATTERN.test(referenceTimeRaw)) {
        sendError(res, 400, "INVALID_QUERY", `referenceTime must end in Z or a +HH:MM offset, got ${referenceTimeRaw}`);
        return;
      }
      const forecastHour = Number(forecastHourRaw);

      const cloudProvider = parseCloudProvider(cloudProviderRaw);
      const referenceTime = new Date(referenceTimeRaw);
      const { forecastCycleType, forecastHourSet } = validateForecastRequest({
        region,
        product,
        cloudProvider,
        referenceTime,
        forecastHour,
      });

      const { config } = buildInventory(region, product, forecastHourSet);

      res.set("Cache-Control", CACHE_INVENTORY);
      res.json({
        id: formatItemId({ region, product, referenceTime, forecastHour }),
        collectionId: formatCollectionId({ region, product, forecastHourSet }),
        referenceTime: referenceTime.toISOString(),
        forecastHour,
        forecastCycleType: forecastCycleType.type,
        forecastHourSet,
        variables: config.variablesFor(forecastHour),
      });
    } catch (error) {
      handleError(res, "items", error);
    }
  });

  app.use((_req, res) => {
    sendError(res, 404, "NOT_FOUND", "No such route");
  });

  return app;
}
