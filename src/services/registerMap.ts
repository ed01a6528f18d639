import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';
import { DATA_TYPES, type MetricDefinition } from '../types/registers.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { registerCount } from './decoder.js';

const MAX_REGISTER = 0xffff;

// Names produced by deriveReadings; a register may not claim them
const DERIVED_METRICS = new Set(['Cosphi']);

const labelSchema = z
  .string()
  .min(1)
  .regex(/^[^/+#]+$/, 'must not contain "/", "+" or "#"');

const metricNameSchema = z
  .string()
  .min(1)
  .regex(/^[^+#]+$/, 'must not contain "+" or "#"')
  .refine((name) => !name.startsWith('/') && !name.endsWith('/'), {
    message: 'must not start or end with "/"',
  });

const RegisterMapSchema = z.object({
  chargePoints: z
    .array(
      z.object({
        label: labelSchema,
        baseAddress: z.number().int().min(0).max(MAX_REGISTER),
      })
    )
    .min(1),
  registers: z
    .array(
      z.object({
        name: metricNameSchema,
        offset: z.number().int().min(0),
        dataType: z.enum(DATA_TYPES),
        registerCount: z.number().int().positive().optional(),
        scale: z
          .number()
          .finite()
          .refine((scale) => scale !== 0, { message: 'must not be 0' })
          .default(1),
      })
    )
    .min(1),
});

type RegisterMapFile = z.infer<typeof RegisterMapSchema>;

/**
 * Static, read-only table of every metric polled from the device. Built once
 * at startup; the definitions are frozen.
 */
export class RegisterMap {
  private readonly definitions: readonly MetricDefinition[];

  constructor(definitions: readonly MetricDefinition[]) {
    this.definitions = Object.freeze(
      definitions.map((definition) => Object.freeze({ ...definition }))
    );
  }

  public lookup(): readonly MetricDefinition[] {
    return this.definitions;
  }

  public labels(): string[] {
    return [...new Set(this.definitions.map((d) => d.deviceLabel))];
  }

  public get size(): number {
    return this.definitions.length;
  }
}

function expand(file: RegisterMapFile, source: string): MetricDefinition[] {
  const errors: string[] = [];
  const seen = new Set<string>();
  const definitions: MetricDefinition[] = [];
  const labels = new Set<string>();

  for (const point of file.chargePoints) {
    if (labels.has(point.label)) {
      errors.push(`chargePoints: duplicate label "${point.label}"`);
    }
    labels.add(point.label);
  }

  file.registers.forEach((entry, idx) => {
    const count = registerCount(entry.dataType);
    if (entry.registerCount !== undefined && entry.registerCount !== count) {
      errors.push(
        `registers[${idx}] ${entry.name}: registerCount ${entry.registerCount} does not match ${entry.dataType} (${count})`
      );
    }
    if (DERIVED_METRICS.has(entry.name)) {
      errors.push(`registers[${idx}] ${entry.name}: name is reserved for a derived metric`);
    }

    for (const point of file.chargePoints) {
      const key = `${point.label}/${entry.name}`;
      if (seen.has(key)) {
        errors.push(`registers[${idx}]: duplicate metric "${key}"`);
        continue;
      }
      seen.add(key);

      const address = point.baseAddress + entry.offset;
      if (address + count - 1 > MAX_REGISTER) {
        errors.push(
          `registers[${idx}] ${key}: address ${address} is out of range`
        );
        continue;
      }

      definitions.push({
        name: entry.name,
        deviceLabel: point.label,
        registerAddress: address,
        registerCount: count,
        dataType: entry.dataType,
        scale: entry.scale,
      });
    }
  });

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Invalid register map ${source}: ${errors.join('; ')}`
    );
  }

  // order charge point by charge point, registers in file order
  return file.chargePoints.flatMap((point) =>
    definitions.filter((d) => d.deviceLabel === point.label)
  );
}

export function parseRegisterMap(text: string, source = '<inline>'): RegisterMap {
  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Register map ${source} is not valid YAML: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  const parsed = RegisterMapSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid register map ${source}: ${issues}`);
  }

  return new RegisterMap(expand(parsed.data, source));
}

export async function loadRegisterMap(filePath: string): Promise<RegisterMap> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read register map ${filePath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  return parseRegisterMap(text, filePath);
}
