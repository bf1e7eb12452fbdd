import { expect } from "chai";
import { InMemoryWatermarkStore } from "../src/batch/watermarkStore";
import { TABLE_REGISTRY } from "../src/model/tables";
import {
  formatReconciliation,
  logReconciliation,
  reconcile,
} from "../src/reconcile";
import {
  FakeSourceClient,
  InMemoryAnalyticalStore,
  captureLogger,
} from "./helpers/fakes";

const T9 = "2024-03-01 09:00:00.000000";
const T10 = "2024-03-01 10:00:00.000000";

const seed = async () => {
  const source = new FakeSourceClient({
    advertiser: [{ id: 1 }, { id: 2 }],
    campaign: [{ id: 5 }],
    impressions: [{ id: 100 }, { id: 101 }, { id: 102 }],
    clicks: [],
  });
  const destination = new InMemoryAnalyticalStore();
  await destination.insert(TABLE_REGISTRY.advertiser.target, [
    { advertiser_id: 1, name: "Acme", updated_at: T9, created_at: T9, is_deleted: 0 },
    { advertiser_id: 1, name: "Acme Ltd", updated_at: T10, created_at: T9, is_deleted: 0 },
  ]);
  const campaign = {
    campaign_id: 5,
    name: "Spring",
    bid: 2,
    budget: 100,
    start_date: null,
    end_date: null,
    advertiser_id: 1,
    created_at: T9,
  };
  await destination.insert(TABLE_REGISTRY.campaign.target, [
    { ...campaign, updated_at: T9, is_deleted: 0 },
    { ...campaign, updated_at: T10, is_deleted: 1 },
  ]);
  const impression = (id: number) => ({
    impression_id: id,
    campaign_id: 5,
    event_date: "2024-03-01",
    event_time: T10,
    created_at: T10,
  });
  await destination.insert(TABLE_REGISTRY.impressions.target, [
    impression(100),
    impression(101),
    impression(101),
  ]);
  const watermarks = new InMemoryWatermarkStore({ campaign: T9 });
  return { source, destination, watermarks };
};

describe("Reconciliation", () => {
  it("should compare source counts with current destination rows", async () => {
    const deps = await seed();

    const results = await reconcile({ ...deps, schema: "public" });

    expect(results).to.deep.equal([
      {
        table: "advertiser",
        target: "dim_advertiser",
        sourceRows: 2,
        destinationRows: 1,
        drift: 1,
        watermark: null,
      },
      {
        table: "campaign",
        target: "dim_campaign",
        sourceRows: 1,
        destinationRows: 0,
        drift: 1,
        watermark: T9,
      },
      {
        table: "impressions",
        target: "fact_impressions",
        sourceRows: 3,
        destinationRows: 2,
        drift: 1,
        watermark: null,
      },
      {
        table: "clicks",
        target: "fact_clicks",
        sourceRows: 0,
        destinationRows: 0,
        drift: 0,
        watermark: null,
      },
    ]);
  });

  it("should format one line per table", async () => {
    const results = await reconcile({ ...(await seed()), schema: "public" });
    const logger = captureLogger();

    logReconciliation(logger, results);

    expect(formatReconciliation(results)[1]).to.equal(
      "campaign -> dim_campaign: source 1, current 0, drift 1, watermark 2024-03-01 09:00:00.000000",
    );
    expect(logger.lines[0]).to.equal(
      "log: advertiser -> dim_advertiser: source 2, current 1, drift 1, watermark unset",
    );
  });
});
