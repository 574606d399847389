export type PrimitiveType = "string" | "int" | "long" | "double" | "boolean";

export interface EnumType {
  type: "enum";
  name: string;
  symbols: string[];
  doc?: string;
}

export interface MapType {
  type: "map";
  values: PrimitiveType;
}

export type FieldType = PrimitiveType | EnumType | MapType;

export type PrimitiveValue = string | number | boolean;

export type FieldValue =
  | PrimitiveValue
  | Readonly<Record<string, PrimitiveValue>>;

export interface FieldSchema {
  name: string;
  type: FieldType;
  optional?: boolean;
  default?: FieldValue;
  doc?: string;
}

export interface RecordSchema {
  type: "record";
  name: string;
  namespace?: string;
  doc?: string;
  fields: FieldSchema[];
}

export const INT_MIN = -2_147_483_648;
export const INT_MAX = 2_147_483_647;

export function isPrimitiveType(type: FieldType): type is PrimitiveType {
  return typeof type === "string";
}

export function fullName(schema: RecordSchema): string {
  return schema.namespace ? `${schema.namespace}.${schema.name}` : schema.name;
}

export function describeType(type: FieldType): string {
  if (isPrimitiveType(type)) return type;
  if (type.type === "enum") return `enum ${type.name}`;
  return `map<${type.values}>`;
}
