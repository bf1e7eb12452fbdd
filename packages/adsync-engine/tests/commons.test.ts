import { expect } from "chai";
import {
  MAX_RETRIES_PRODUCER,
  MAX_RETRY_TIME_MS,
  backoffDelay,
  buildKafkaConfig,
  createProducerConfig,
  parseBrokerString,
  withTimeout,
} from "../src/commons";
import {
  ConfigurationError,
  ConnectionError,
  DecodeError,
  TimeoutError,
  WriteError,
  errorCode,
  isConnectionFailure,
  isRetriable,
} from "../src/errors";
import { captureLogger, rejectionOf } from "./helpers/fakes";

describe("Commons", () => {
  describe("createProducerConfig", () => {
    it("should disable idempotence for at-least-once delivery", () => {
      expect(createProducerConfig().idempotent).to.equal(false);
    });

    it("should include retry configuration", () => {
      expect(createProducerConfig().retry).to.deep.equal({
        retries: MAX_RETRIES_PRODUCER,
        maxRetryTime: MAX_RETRY_TIME_MS,
      });
    });
  });

  describe("buildKafkaConfig", () => {
    it("should trim brokers and drop empty entries", () => {
      expect(parseBrokerString(" b1:9092, ,b2:9092 ")).to.deep.equal([
        "b1:9092",
        "b2:9092",
      ]);
    });

    it("should build a plaintext config without SASL", () => {
      const config = buildKafkaConfig(
        { clientId: "adsync", broker: "b1:9092" },
        captureLogger(),
      );

      expect(config.brokers).to.deep.equal(["b1:9092"]);
      expect(config.ssl).to.equal(false);
      expect(config).to.not.have.property("sasl");
    });

    it("should enable SSL and SASL for SASL_SSL", () => {
      const config = buildKafkaConfig(
        {
          clientId: "adsync",
          broker: "b1:9092",
          securityProtocol: "SASL_SSL",
          saslMechanism: "SCRAM-SHA-256",
          saslUsername: "user",
          saslPassword: "test-secret",
        },
        captureLogger(),
      );

      expect(config.ssl).to.equal(true);
      expect(config.sasl).to.deep.equal({
        mechanism: "scram-sha-256",
        username: "user",
        password: "test-secret",
      });
    });

    it("should warn about unsupported mechanisms", () => {
      const logger = captureLogger();
      const config = buildKafkaConfig(
        { clientId: "adsync", broker: "b1:9092", saslMechanism: "gssapi" },
        logger,
      );

      expect(config).to.not.have.property("sasl");
      expect(logger.lines).to.deep.equal(["warn: Unsupported SASL mechanism: gssapi"]);
    });

    it("should reject an empty broker list", () => {
      expect(() =>
        buildKafkaConfig({ clientId: "adsync", broker: " , " }, captureLogger()),
      ).to.throw('No valid broker addresses found in: " , "');
    });
  });

  describe("backoffDelay", () => {
    it("should double per attempt up to the cap", () => {
      expect(backoffDelay(1, 100, 1000)).to.equal(100);
      expect(backoffDelay(3, 100, 1000)).to.equal(400);
      expect(backoffDelay(5, 100, 1000)).to.equal(1000);
    });
  });

  describe("withTimeout", () => {
    it("should return the result of a fast operation", async () => {
      expect(await withTimeout("fast", 100, async () => 42)).to.equal(42);
    });

    it("should reject with TimeoutError and abort the operation", async () => {
      const seen: { signal?: AbortSignal } = {};
      const error = await rejectionOf(
        withTimeout("slow", 10, (signal) => {
          seen.signal = signal;
          return new Promise<void>(() => undefined);
        }),
      );

      expect(error).to.be.instanceOf(TimeoutError);
      if (error instanceof TimeoutError) {
        expect(error.message).to.equal("slow timed out after 10ms");
        expect(error.timeoutMs).to.equal(10);
      }
      expect(seen.signal?.aborted).to.equal(true);
    });
  });
});

describe("Errors", () => {
  it("should mark which errors may succeed on retry", () => {
    expect(isRetriable(new ConnectionError("down"))).to.equal(true);
    expect(isRetriable(new TimeoutError("load", 5))).to.equal(true);
    expect(isRetriable(new WriteError("rejected"))).to.equal(true);
    expect(isRetriable(new DecodeError("bad"))).to.equal(false);
    expect(isRetriable(new ConfigurationError("missing"))).to.equal(false);
    expect(isRetriable(new Error("unknown"))).to.equal(true);
  });

  it("should name each error class", () => {
    expect(new TimeoutError("load", 5).name).to.equal("TimeoutError");
    expect(new DecodeError("bad").name).to.equal("DecodeError");
  });

  it("should recognise socket failures", () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED"), {
      code: "ECONNREFUSED",
    });

    expect(errorCode(refused)).to.equal("ECONNREFUSED");
    expect(isConnectionFailure(refused)).to.equal(true);
    expect(isConnectionFailure(new Error("syntax error"))).to.equal(false);
    expect(errorCode("text")).to.equal(undefined);
  });
});
