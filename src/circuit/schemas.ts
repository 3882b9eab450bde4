/**
 * Circuit Description - Zod Validation Schemas
 *
 * Schemas for the JSON circuit description files read by the service and the
 * MCP server.
 */

import { z } from "zod";

// =============================================================================
// Components
// =============================================================================

const NameSchema = z
  .string()
  .min(1)
  .regex(/^[^.\s]+$/, "component names may not contain dots or whitespace");

const TerminalSchema = z.string().min(1);

/** Kinds whose terminals are fixed by the kind. */
export const FIXED_KINDS = [
  "ground",
  "resistor",
  "capacitor",
  "inductor",
  "diode",
  "dc_voltage_source",
  "dc_current_source",
  "ac_voltage_source",
  "ac_current_source",
  "voltage_probe",
  "current_probe",
  "substrate",
] as const;

export const FixedComponentSchema = z.object({
  name: NameSchema,
  kind: z.enum(FIXED_KINDS),
  value: z.number().optional(),
});

export const PowerSourceSchema = z.object({
  name: NameSchema,
  kind: z.literal("power_source"),
  port: z.number().int().positive(),
  impedance: z.number().positive().optional(),
});

export const SParameterFileSchema = z.object({
  name: NameSchema,
  kind: z.literal("sparameter_file"),
  ports: z.number().int().positive(),
  file: z.string().optional(),
});

export const GenericComponentSchema = z.object({
  name: NameSchema,
  kind: z.literal("generic"),
  terminals: z.array(TerminalSchema).min(1),
});

export const ComponentSpecSchema = z.discriminatedUnion("kind", [
  FixedComponentSchema,
  PowerSourceSchema,
  SParameterFileSchema,
  GenericComponentSchema,
]);

// =============================================================================
// Circuit
// =============================================================================

/** `NAME.terminal`, or a bare `NAME` for the component's first terminal. */
export const PinRefSchema = z.string().regex(/^[^.\s]+(\.[^.\s]+)?$/, "expected NAME or NAME.terminal");

export const CircuitDescriptionSchema = z
  .object({
    components: z.array(ComponentSpecSchema),
    connections: z.array(z.tuple([PinRefSchema, PinRefSchema])).default([]),
  })
  .superRefine((description, ctx) => {
    const seen = new Set<string>();
    description.components.forEach((component, index) => {
      if (seen.has(component.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate component name '${component.name}'`,
          path: ["components", index, "name"],
        });
      }
      seen.add(component.name);
    });

    description.connections.forEach((connection, index) => {
      connection.forEach((ref, side) => {
        const name = ref.split(".")[0];
        if (!seen.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unknown component '${name}'`,
            path: ["connections", index, side],
          });
        }
      });
    });
  });

export type ComponentSpec = z.infer<typeof ComponentSpecSchema>;
export type CircuitDescription = z.infer<typeof CircuitDescriptionSchema>;
