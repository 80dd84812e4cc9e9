import { z } from "zod"

import type { ActionGraphContainer } from "../../ports/action-graph"

const id = z.number().int().nonnegative()

const keyValuePair = z.object({ key: z.string(), value: z.string() })

export const actionGraphContainerSchema = z.object({
  artifacts: z.array(
    z.object({ id, pathFragmentId: id, isTreeArtifact: z.boolean() }),
  ),
  actions: z.array(
    z.object({
      id,
      targetId: id,
      actionKey: z.string(),
      mnemonic: z.string(),
      configurationId: id,
      arguments: z.array(z.string()),
      environmentVariables: z.array(keyValuePair),
      inputDepSetIds: z.array(id),
      outputIds: z.array(id),
      primaryOutputId: id.optional(),
      discoversInputs: z.boolean(),
      executionInfo: z.array(keyValuePair),
      executionPlatform: z.string().optional(),
    }),
  ),
  targets: z.array(z.object({ id, label: z.string(), ruleClassId: id.optional() })),
  depSetOfFiles: z.array(
    z.object({ id, directArtifactIds: z.array(id), transitiveDepSetIds: z.array(id) }),
  ),
  configuration: z.array(
    z.object({
      id,
      checksum: z.string(),
      mnemonic: z.string(),
      platformName: z.string(),
      isTool: z.boolean(),
    }),
  ),
  ruleClasses: z.array(z.object({ id, name: z.string() })),
  pathFragments: z.array(z.object({ id, label: z.string(), parentId: id.optional() })),
}) satisfies z.ZodType<ActionGraphContainer>
