import {
  InMemorySchemaRegistry,
  MalformedMessageError,
  SchemaCompiler,
  SchemaMismatchError,
  SerdeFactory,
  UnknownSchemaError,
  ValidationError,
  loadConfig,
  type FetchLike,
  type ILogDriver,
  type ISerde,
  type RecordSchema,
} from "@sensorbus/codec";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  AlertEventContract,
  Destinations,
  SensorDataContract,
  SensorOutputContract,
  SensorOutputV1Contract,
  buildAlertEvent,
  buildSensorData,
  buildSensorOutput,
  defineContract,
  registerCatalog,
  type SensorData,
} from "../index";

const sensorData = {
  sensorId: "sensor-001",
  equipmentId: "boiler-a",
  timestamp: 1_700_000_000,
  temperature: 75.5,
  unit: "Celsius",
  location: "Plant-A",
  status: "ONLINE",
} as const;

const sensorOutput = {
  equipmentId: "boiler-a",
  windowStart: 1_700_000_000_000,
  windowEnd: 1_700_000_060_000,
  averageTemperature: 70,
  maxTemperature: 80,
  minTemperature: 60,
  sensorCount: 4,
  unit: "Celsius",
  location: "Plant-A",
  processingTime: 1_700_000_060_250,
} as const;

function createDriver() {
  return {
    info: vi.fn<ILogDriver["info"]>(),
    warn: vi.fn<ILogDriver["warn"]>(),
    error: vi.fn<ILogDriver["error"]>(),
  };
}

function extend(schema: RecordSchema, ...fields: RecordSchema["fields"]): RecordSchema {
  return { ...schema, fields: [...schema.fields, ...fields] };
}

let serde: ISerde | undefined;

function setup(env: Record<string, string> = {}) {
  const registry = new InMemorySchemaRegistry();
  const driver = createDriver();
  const created = new SerdeFactory().create(loadConfig(env), { registry, logDriver: driver });
  serde = created;
  return { serde: created, registry, driver };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to fail");
}

afterEach(() => serde?.close());

describe("Serde round trips", () => {
  it("reproduces a SensorData reading with pressure and metadata absent", async () => {
    const { serde } = setup();
    const bytes = await serde.serialize(SensorDataContract, buildSensorData(sensorData));

    expect(bytes[0]).toBe(0x00);
    expect(bytes.readUInt32BE(1)).toBe(1);

    const decoded = await serde.deserialize(SensorDataContract, bytes);
    expect(decoded).toEqual(sensorData);
    expect("pressure" in decoded).toBe(false);
    expect("metadata" in decoded).toBe(false);
    expect(Object.isFrozen(decoded)).toBe(true);
  });

  it("round-trips optional SensorData fields when present", async () => {
    const { serde } = setup();
    const record = buildSensorData({
      ...sensorData,
      pressure: 2.5,
      metadata: { firmware: "1.4.2", line: "3" },
    });

    const decoded = await serde.deserialize(
      SensorDataContract,
      await serde.serialize(SensorDataContract, record)
    );
    expect(decoded).toEqual(record);
  });

  it("keeps acknowledged false on a CRITICAL AlertEvent", async () => {
    const { serde } = setup();
    const alert = buildAlertEvent({
      alertId: "alert-1",
      sensorId: "sensor-001",
      equipmentId: "boiler-a",
      location: "Plant-A",
      timestamp: 1_700_000_000,
      temperature: 95,
      threshold: 90,
      severity: "CRITICAL",
      message: "Temperature above threshold",
      acknowledged: false,
    });

    const decoded = await serde.deserialize(
      AlertEventContract,
      await serde.serialize(AlertEventContract, alert)
    );
    expect(decoded).toEqual(alert);
    expect(decoded.acknowledged).toBe(false);
  });

  it("round-trips a SensorOutput with an anomaly score", async () => {
    const { serde } = setup();
    const record = buildSensorOutput({ ...sensorOutput, anomalyScore: 0.93 });

    const decoded = await serde.deserialize(
      SensorOutputContract,
      await serde.serialize(SensorOutputContract, record)
    );
    expect(decoded).toEqual(record);
  });
});

describe("Serde schema evolution", () => {
  it("reads first-revision SensorOutput with anomalyScore absent", async () => {
    const { serde } = setup();
    const bytes = await serde.serialize(SensorOutputV1Contract, sensorOutput);

    const decoded = await serde.deserialize(SensorOutputContract, bytes);
    expect(decoded).toEqual(sensorOutput);
    expect("anomalyScore" in decoded).toBe(false);
  });

  it("lets first-revision readers ignore anomalyScore", async () => {
    const { serde, registry } = setup();
    await serde.register(SensorOutputV1Contract);
    const bytes = await serde.serialize(SensorOutputContract, { ...sensorOutput, anomalyScore: 0.4 });

    expect(registry.versions("aggregated-sensor-metrics-value")).toEqual([1, 2]);
    await expect(serde.deserialize(SensorOutputV1Contract, bytes)).resolves.toEqual(sensorOutput);
  });

  it("fills a reader default for a field the writer lacks", async () => {
    interface VersionedSensorData extends SensorData {
      firmware: string;
    }
    const reader = defineContract<VersionedSensorData>(
      "SensorData",
      Destinations.SensorData,
      new SchemaCompiler().compile<VersionedSensorData>(
        extend(SensorDataContract.schema.definition, {
          name: "firmware",
          type: "string",
          default: "unknown",
        })
      )
    );
    const { serde } = setup();
    const bytes = await serde.serialize(SensorDataContract, sensorData);

    await expect(serde.deserialize(reader, bytes)).resolves.toEqual({
      ...sensorData,
      firmware: "unknown",
    });
  });

  it("fails when the reader requires a field the writer lacks", async () => {
    interface CalibratedSensorData extends SensorData {
      calibratedBy: string;
    }
    const reader = defineContract<CalibratedSensorData>(
      "SensorData",
      Destinations.SensorData,
      new SchemaCompiler().compile<CalibratedSensorData>(
        extend(SensorDataContract.schema.definition, { name: "calibratedBy", type: "string" })
      )
    );
    const { serde, driver } = setup();
    const bytes = await serde.serialize(SensorDataContract, sensorData);

    const error = await rejection(serde.deserialize(reader, bytes));
    expect(error).toBeInstanceOf(SchemaMismatchError);
    expect(error).toMatchObject({ field: "calibratedBy" });

    serde.close();
    expect(driver.warn).toHaveBeenCalledWith(
      "Message decoding failed",
      expect.objectContaining({ destination: "sensor-raw-data", label: "serde" })
    );
  });
});

describe("Serde failures", () => {
  it("validates before registering", async () => {
    const { serde, registry } = setup();
    const register = vi.spyOn(registry, "register");

    const error = await rejection(
      serde.serialize(SensorOutputContract, { ...sensorOutput, sensorCount: 1.5 })
    );
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: 'Invalid SensorOutput: field "sensorCount" expected int but got number',
    });
    expect(register).not.toHaveBeenCalled();
  });

  it("rejects an unknown schema id", async () => {
    const { serde, driver } = setup();
    const message = Buffer.from([0x00, 0x00, 0x00, 0x00, 0x63]);

    await expect(serde.deserialize(SensorDataContract, message)).rejects.toThrow(
      new UnknownSchemaError(99)
    );

    serde.close();
    expect(driver.warn).toHaveBeenCalledWith(
      "Message decoding failed",
      expect.objectContaining({ error: "Schema 99 is not known to the registry" })
    );
  });

  it("rejects a frame with the wrong magic byte", async () => {
    const { serde } = setup();
    const bytes = await serde.serialize(SensorDataContract, sensorData);
    bytes[0] = 0x01;

    await expect(serde.deserialize(SensorDataContract, bytes)).rejects.toBeInstanceOf(
      MalformedMessageError
    );
  });

  it("rejects bytes written for another record", async () => {
    const { serde } = setup();
    const bytes = await serde.serialize(SensorOutputContract, sensorOutput);

    await expect(serde.deserialize(SensorDataContract, bytes)).rejects.toThrow(
      "record SensorData cannot read record SensorOutput"
    );
  });
});

describe("Serde registration", () => {
  it("registers each schema once, including concurrent first uses", async () => {
    const { serde, registry } = setup();
    const register = vi.spyOn(registry, "register");

    await Promise.all([
      serde.serialize(SensorDataContract, sensorData),
      serde.serialize(SensorDataContract, sensorData),
    ]);
    await serde.serialize(SensorDataContract, sensorData);

    expect(register).toHaveBeenCalledTimes(1);
    expect(register).toHaveBeenCalledWith("sensor-raw-data-value", SensorDataContract.schema.definition);
  });

  it("names subjects after the record under the record strategy", async () => {
    const { serde, registry } = setup({ SCHEMA_SUBJECT_STRATEGY: "record" });
    await serde.register(SensorDataContract);

    expect(registry.listSubjects()).toEqual(["sensorbus.telemetry.SensorData"]);
  });

  it("registers the whole catalog", async () => {
    const { serde, registry } = setup();

    await expect(registerCatalog(serde)).resolves.toEqual([1, 2, 3]);
    expect(registry.listSubjects()).toEqual([
      "sensor-raw-data-value",
      "aggregated-sensor-metrics-value",
      "sensor-alerts-value",
    ]);
  });

  it("checks candidate schemas against the registered revision", async () => {
    const { serde } = setup();
    await serde.register(SensorOutputV1Contract);

    await expect(serde.checkCompatibility(SensorOutputContract)).resolves.toEqual({
      compatible: true,
      violations: [],
    });

    const breaking = extend(SensorOutputContract.schema.definition, {
      name: "plantId",
      type: "string",
    });
    const report = await serde.checkCompatibility(SensorOutputContract, breaking);
    expect(report.compatible).toBe(false);
    expect(report.violations).toEqual([
      'backward: field "plantId" is required by the reader schema but missing from the writer schema and has no default',
    ]);
  });

  it("talks to a remote registry when a URL is configured", async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValueOnce(
      new Response(JSON.stringify({ id: 21 }), { status: 200 })
    );
    const remote = new SerdeFactory().create(
      loadConfig({ SCHEMA_REGISTRY_URL: "http://registry.test" }),
      { fetch, logDriver: createDriver() }
    );
    serde = remote;

    const bytes = await remote.serialize(SensorDataContract, sensorData);
    expect(bytes.readUInt32BE(1)).toBe(21);
    await expect(remote.deserialize(SensorDataContract, bytes)).resolves.toEqual(sensorData);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0][0]).toBe(
      "http://registry.test/subjects/sensor-raw-data-value/versions"
    );
  });
});
