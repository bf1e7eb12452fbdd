import { expect } from "chai";
import {
  parseSyncSettings,
  requireConnector,
  requirePostgres,
} from "../src/config/runtime";
import { ConfigurationError, ConnectionError } from "../src/errors";
import { SOURCE_TABLES } from "../src/model/tables";
import {
  FetchLike,
  HttpResponseLike,
  buildConnectorDefinition,
  ensureConnector,
} from "../src/stream/connector";
import { captureLogger, rejectionOf } from "./helpers/fakes";

const settings = parseSyncSettings({
  postgres_config: {
    host: "localhost",
    user: "postgres",
    password: "test-secret",
    db_name: "ads",
  },
  kafka_config: { broker: "kafka:9092", topic_prefix: "cdc" },
  connector_config: { url: "http://connect:8083", database_host: "postgres" },
});

const definition = buildConnectorDefinition(
  requireConnector(settings),
  requirePostgres(settings),
  settings.kafka_config,
  SOURCE_TABLES,
);

const response = (status: number, body: unknown): HttpResponseLike => ({
  ok: status >= 200 && status < 300,
  status,
  json: async () => body,
  text: async () => (typeof body === "string" ? body : JSON.stringify(body)),
});

interface Call {
  url: string;
  method: string;
  body?: string;
}

const scriptedFetch = (
  steps: Array<HttpResponseLike | Error>,
): { fetch: FetchLike; calls: Call[] } => {
  const calls: Call[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, method: init?.method ?? "GET", body: init?.body });
    const step = steps.shift();
    if (step === undefined) {
      throw new Error("unexpected request");
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  };
  return { fetch, calls };
};

describe("Connector registration", () => {
  describe("buildConnectorDefinition", () => {
    it("should capture every synced table through pgoutput", () => {
      expect(definition.name).to.equal("adsync-postgres-connector");
      expect(definition.config).to.include({
        "connector.class": "io.debezium.connector.postgresql.PostgresConnector",
        "plugin.name": "pgoutput",
        "database.hostname": "postgres",
        "database.port": "5432",
        "database.user": "postgres",
        "database.dbname": "ads",
        "topic.prefix": "cdc",
        "table.include.list":
          "public.advertiser,public.campaign,public.impressions,public.clicks",
        "slot.name": "adsync",
        "publication.name": "adsync_publication",
        "decimal.handling.mode": "string",
        "value.converter.schemas.enable": "false",
      });
    });
  });

  describe("ensureConnector", () => {
    const options = (fetch: FetchLike, retries = 3) => ({
      url: "http://connect:8083",
      retries,
      retryDelayMs: 1,
      logger: captureLogger(),
      fetch,
    });

    it("should register a missing connector", async () => {
      const { fetch, calls } = scriptedFetch([
        response(200, ["other-connector"]),
        response(201, {}),
      ]);

      expect(await ensureConnector(definition, options(fetch))).to.equal("created");
      expect(calls).to.deep.equal([
        { url: "http://connect:8083/connectors", method: "GET", body: undefined },
        {
          url: "http://connect:8083/connectors",
          method: "POST",
          body: JSON.stringify(definition),
        },
      ]);
    });

    it("should leave an existing connector alone", async () => {
      const { fetch, calls } = scriptedFetch([
        response(200, ["adsync-postgres-connector"]),
      ]);

      expect(await ensureConnector(definition, options(fetch))).to.equal("exists");
      expect(calls).to.have.length(1);
    });

    it("should wait for Kafka Connect to come up", async () => {
      const { fetch, calls } = scriptedFetch([
        new Error("connect ECONNREFUSED"),
        response(503, "starting"),
        response(200, []),
        response(201, {}),
      ]);

      expect(await ensureConnector(definition, options(fetch))).to.equal("created");
      expect(calls).to.have.length(4);
    });

    it("should give up after the configured attempts", async () => {
      const { fetch } = scriptedFetch([
        new Error("connect ECONNREFUSED"),
        new Error("connect ECONNREFUSED"),
      ]);

      const error = await rejectionOf(ensureConnector(definition, options(fetch, 2)));

      expect(error).to.be.instanceOf(ConnectionError);
      if (error instanceof ConnectionError) {
        expect(error.message).to.equal(
          "Kafka Connect at http://connect:8083 unreachable: connect ECONNREFUSED",
        );
      }
    });

    it("should treat a conflict as already registered", async () => {
      const { fetch } = scriptedFetch([response(200, []), response(409, "exists")]);

      expect(await ensureConnector(definition, options(fetch))).to.equal("exists");
    });

    it("should report a rejected definition", async () => {
      const { fetch } = scriptedFetch([
        response(200, []),
        response(400, "Connector configuration is invalid"),
      ]);

      const error = await rejectionOf(ensureConnector(definition, options(fetch)));

      expect(error).to.be.instanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).to.equal(
          "Kafka Connect rejected adsync-postgres-connector (HTTP 400): Connector configuration is invalid",
        );
      }
    });
  });
});
