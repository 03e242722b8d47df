import { Hono, type Context } from "hono";
import { isAxiosError } from "axios";
import { InvalidDateError, NiluClient } from "../services/nilu-client";

// "true"/"false" only; anything else counts as not given
function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === "true") return true;
  if (value === "false") return false;
  return undefined;
}

// Blank counts as invalid; Number("") would read it as 0
function parseInteger(value: string): number | undefined {
  if (value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

function respondWithError(c: Context, action: string, error: unknown) {
  console.error(`Error fetching ${action}:`, error);

  if (isAxiosError(error) && error.response) {
    return c.json(
      {
        error: `Failed to fetch ${action}`,
        status: error.response.status,
        details: error.response.data,
      },
      502
    );
  }

  if (error instanceof InvalidDateError) {
    return c.json({ error: error.message }, 400);
  }

  return c.json(
    {
      error: `Failed to fetch ${action}`,
      message: error instanceof Error ? error.message : String(error),
    },
    500
  );
}

export function createNiluRoutes(client: NiluClient) {
  const app = new Hono();

  app.get("/areas", async (c) => {
    try {
      return c.json(await client.getAreas());
    } catch (error) {
      return respondWithError(c, "areas", error);
    }
  });

  app.get("/stations", async (c) => {
    try {
      const area = c.req.query("area");
      const utd = parseBoolean(c.req.query("utd"));
      console.log(`Station lookup: area=${area ?? "any"}, utd=${utd ?? "-"}`);

      return c.json(await client.getStations({ area, utd }));
    } catch (error) {
      return respondWithError(c, "stations", error);
    }
  });

  app.get("/components", async (c) => {
    try {
      return c.json(await client.getComponents());
    } catch (error) {
      return respondWithError(c, "components", error);
    }
  });

  app.get("/aqis", async (c) => {
    try {
      const data = await client.getAirQualityIndex({
        component: c.req.query("component"),
        culture: c.req.query("culture"),
      });
      return c.json(data);
    } catch (error) {
      return respondWithError(c, "air quality index", error);
    }
  });

  app.get("/timeseries", async (c) => {
    try {
      const rawTimestep = c.req.query("timestep");
      const timestep =
        rawTimestep === undefined ? undefined : parseInteger(rawTimestep);
      if (rawTimestep !== undefined && timestep === undefined) {
        return c.json({ error: `Invalid timestep: ${rawTimestep}` }, 400);
      }

      const data = await client.getTimeseries({
        station: c.req.query("station"),
        component: c.req.query("component"),
        timestep,
      });
      return c.json(data);
    } catch (error) {
      return respondWithError(c, "time series", error);
    }
  });

  app.get("/observations/:from/:to/:station?", async (c) => {
    try {
      const from = c.req.param("from");
      const to = c.req.param("to");
      const station = c.req.param("station");
      // Accepts both ?components=NOx;PM10 and ?components=NOx&components=PM10
      const components = c.req.queries("components");

      console.log(
        `Observations ${from} to ${to} for station ${station ?? "all"}`
      );

      const data = await client.getObservations(from, to, {
        station,
        components: components?.join(";"),
        showinvalid: parseBoolean(c.req.query("showinvalid")),
      });
      return c.json(data);
    } catch (error) {
      return respondWithError(c, "observations", error);
    }
  });

  return app;
}
