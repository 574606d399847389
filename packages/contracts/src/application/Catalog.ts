import type { ISerde } from "@sensorbus/codec";
import {
  AlertEventContract,
  SensorDataContract,
  SensorOutputContract,
} from "./contracts";

/** Current revision of every contract, one per destination. */
export const Catalog = [SensorDataContract, SensorOutputContract, AlertEventContract] as const;

export type CatalogContract = (typeof Catalog)[number];

export function contractForDestination(destination: string): CatalogContract | undefined {
  return Catalog.find((contract) => contract.destination === destination);
}

/** Registers every current schema; resolves to the ids in catalog order. */
export async function registerCatalog(serde: Pick<ISerde, "register">): Promise<number[]> {
  const ids: number[] = [];
  for (const contract of Catalog) {
    ids.push(await serde.register<object>(contract));
  }
  return ids;
}
