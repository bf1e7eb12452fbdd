import { ClickHouseError } from "@clickhouse/client";
import { expect } from "chai";
import { ClickHouseWatermarkStore } from "../src/batch/watermarkStore";
import { ClickHouseAnalyticalStore } from "../src/destination/analyticalStore";
import { ConnectionError, WriteError } from "../src/errors";
import { DimCampaignRow, TABLE_REGISTRY } from "../src/model/tables";
import { FakeClickHouse, maxWatermarkOf, rejectionOf } from "./helpers/fakes";

const NOON = new Date(Date.UTC(2024, 2, 1, 12));
const T10 = "2024-03-01 10:00:00.000000";
const T11 = "2024-03-01 11:00:00.000000";

const watermarks = () => {
  const client = new FakeClickHouse();
  client.respond = maxWatermarkOf;
  return { client, store: new ClickHouseWatermarkStore(client, () => NOON) };
};

describe("ClickHouse watermark store", () => {
  it("should read the largest cursor of the table", async () => {
    const { client, store } = watermarks();

    expect(await store.get("campaign")).to.equal(null);
    expect(client.queries).to.deep.equal([
      {
        query:
          "SELECT max(cursor) AS cursor FROM `etl_watermarks` WHERE table_name = {p0:String} GROUP BY table_name",
        query_params: { p0: "campaign" },
        format: "JSONEachRow",
      },
    ]);
  });

  it("should append one row per advance", async () => {
    const { client, store } = watermarks();

    await store.set("campaign", T10);
    await store.set("campaign", T11);

    expect(await store.get("campaign")).to.equal(T11);
    expect(client.rowsOf("etl_watermarks")).to.deep.equal([
      { table_name: "campaign", cursor: T10, updated_at: "2024-03-01 12:00:00.000000" },
      { table_name: "campaign", cursor: T11, updated_at: "2024-03-01 12:00:00.000000" },
    ]);
    expect(client.inserts[0]).to.deep.include({
      table: "etl_watermarks",
      format: "JSONEachRow",
      clickhouse_settings: { wait_end_of_query: 1 },
    });
  });

  it("should not move a mark backwards", async () => {
    const { client, store } = watermarks();

    await store.set("campaign", T11);
    await store.set("campaign", T10);
    await store.set("campaign", T11);

    expect(client.inserts).to.have.length(1);
    expect(await store.get("campaign")).to.equal(T11);
  });

  it("should keep the largest cursor whatever order rows were stored in", async () => {
    const { client, store } = watermarks();
    await client.insert({
      table: "etl_watermarks",
      values: [
        { table_name: "campaign", cursor: T11, updated_at: "2024-03-01 09:00:00.000000" },
        { table_name: "campaign", cursor: T10, updated_at: "2024-03-01 13:00:00.000000" },
        { table_name: "clicks", cursor: "2024-03-02 00:00:00.000000", updated_at: "2024-03-01 13:00:00.000000" },
      ],
      format: "JSONEachRow",
    });

    expect(await store.get("campaign")).to.equal(T11);
    expect(await store.get("impressions")).to.equal(null);
  });

  it("should report an unreachable server as a connection error", async () => {
    const { client, store } = watermarks();
    client.failure = new Error("socket hang up");

    const error = await rejectionOf(store.get("clicks"));

    expect(error).to.be.instanceOf(ConnectionError);
    if (error instanceof ConnectionError) {
      expect(error.message).to.equal("read watermark of clicks failed: socket hang up");
    }
  });
});

describe("ClickHouse analytical store", () => {
  const target = TABLE_REGISTRY.campaign.target;
  const row: DimCampaignRow = {
    campaign_id: 5,
    name: "Spring",
    bid: 2.5,
    budget: 100,
    start_date: "2024-03-01",
    end_date: null,
    advertiser_id: 1,
    updated_at: T10,
    created_at: T10,
    is_deleted: 0,
  };

  it("should insert rows with the caller's abort signal", async () => {
    const client = new FakeClickHouse();
    const controller = new AbortController();

    await new ClickHouseAnalyticalStore(client).insert(target, [row], {
      signal: controller.signal,
    });

    expect(client.inserts).to.have.length(1);
    expect(client.inserts[0]).to.deep.equal({
      table: "dim_campaign",
      values: [row],
      format: "JSONEachRow",
      abort_signal: controller.signal,
      clickhouse_settings: { wait_end_of_query: 1 },
    });
  });

  it("should not call ClickHouse for an empty batch", async () => {
    const client = new FakeClickHouse();

    await new ClickHouseAnalyticalStore(client).insert(target, []);

    expect(client.inserts).to.deep.equal([]);
  });

  it("should report a rejected insert as a write error", async () => {
    const client = new FakeClickHouse();
    client.failure = new ClickHouseError({
      message: "Unknown table",
      code: "60",
      type: "UNKNOWN_TABLE",
    });

    const error = await rejectionOf(
      new ClickHouseAnalyticalStore(client).insert(target, [row]),
    );

    expect(error).to.be.instanceOf(WriteError);
    if (error instanceof WriteError) {
      expect(error.message).to.equal(
        "insert into dim_campaign rejected by ClickHouse (code 60): Unknown table",
      );
      expect(error.retriable).to.equal(true);
    }
  });

  it("should report a lost connection as a connection error", async () => {
    const client = new FakeClickHouse();
    client.failure = new Error("ECONNRESET");

    const error = await rejectionOf(
      new ClickHouseAnalyticalStore(client).insert(target, [row]),
    );

    expect(error).to.be.instanceOf(ConnectionError);
    if (error instanceof ConnectionError) {
      expect(error.message).to.equal("insert into dim_campaign failed: ECONNRESET");
    }
  });

  it("should count current rows from the collapsed versions", async () => {
    const client = new FakeClickHouse();
    client.respond = () => [{ count: "3" }];

    expect(await new ClickHouseAnalyticalStore(client).countCurrent(target)).to.equal(3);
    expect(client.queries[0].query).to.equal(
      "SELECT count() AS count FROM (SELECT `campaign_id`, argMax(`is_deleted`, `updated_at`) AS deleted FROM `dim_campaign` GROUP BY `campaign_id`) WHERE deleted = 0",
    );
  });
});
