import * as z from 'zod/v4';

import { errorMessage } from '../errors.js';
import { getStringAttribute, isRecord, toConfigMapping, toStringList } from '../homeassistant/normalizer.js';
import type { Entity, SceneConfig, SceneEntityState } from '../homeassistant/types.js';
import { getNumber, getOptionalString, getRecord, getString, type ToolArgs } from './args.js';
import type { ToolContext, ToolDefinition } from './registry.js';
import { errorResult, jsonResult, textResult, type ToolResult } from './results.js';

interface SceneSummary {
  entity_id: string;
  state: string;
  friendly_name?: string;
  entity_ids?: string[];
}

function summarizeScene(scene: Entity): SceneSummary {
  const entityIds = toStringList(scene.attributes.entity_id);
  return {
    entity_id: scene.entity_id,
    state: scene.state,
    friendly_name: getStringAttribute(scene.attributes, 'friendly_name'),
    ...(entityIds.length > 0 ? { entity_ids: entityIds } : {})
  };
}

/**
 * Scene members as given by the caller: each value is a state string or
 * `{state, attributes}`. Returns the offending entity id on a bad value.
 */
export function parseSceneEntities(
  raw: Record<string, unknown>
): { entities: Record<string, SceneEntityState> } | { invalid: string } {
  const entities: Record<string, SceneEntityState> = {};
  for (const [entityId, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      entities[entityId] = { state: value };
      continue;
    }
    if (!isRecord(value)) {
      return { invalid: entityId };
    }
    const member: SceneEntityState = {};
    if (typeof value.state === 'string') {
      member.state = value.state;
    }
    if (isRecord(value.attributes)) {
      member.attributes = toConfigMapping(value.attributes);
    }
    entities[entityId] = member;
  }
  return { entities };
}

async function listScenes(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  let scenes: Entity[];
  try {
    scenes = await ctx.client.listScenes(ctx.signal);
  } catch (error) {
    return errorResult(`Error listing scenes: ${errorMessage(error)}`);
  }

  const nameContains = getString(args, 'name_contains').toLowerCase();
  const entityContains = getString(args, 'entity_contains').toLowerCase();

  const result = scenes.map(summarizeScene).filter((scene) => {
    if (
      nameContains &&
      !scene.entity_id.toLowerCase().includes(nameContains) &&
      !(scene.friendly_name ?? '').toLowerCase().includes(nameContains)
    ) {
      return false;
    }
    if (entityContains && !(scene.entity_ids ?? []).some((id) => id.toLowerCase().includes(entityContains))) {
      return false;
    }
    return true;
  });

  return jsonResult(result, 'scenes', `Found ${result.length} scenes`);
}

async function getScene(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const sceneId = getString(args, 'scene_id');
  if (!sceneId) {
    return errorResult('scene_id is required');
  }

  try {
    const scene = await ctx.client.getSceneConfig(sceneId, ctx.signal);
    return jsonResult(scene, 'scene');
  } catch (error) {
    return errorResult(`Error getting scene: ${errorMessage(error)}`);
  }
}

async function createScene(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const sceneId = getString(args, 'scene_id');
  if (!sceneId) {
    return errorResult('scene_id is required');
  }
  const name = getString(args, 'name');
  if (!name) {
    return errorResult('name is required');
  }
  const rawEntities = getRecord(args, 'entities');
  if (!rawEntities || Object.keys(rawEntities).length === 0) {
    return errorResult('entities is required and must be a non-empty object');
  }

  const parsed = parseSceneEntities(rawEntities);
  if ('invalid' in parsed) {
    return errorResult(`Invalid state format for entity ${parsed.invalid}`);
  }

  const icon = getString(args, 'icon');
  const config: SceneConfig = {
    id: sceneId,
    name,
    ...(icon ? { icon } : {}),
    entities: parsed.entities
  };

  try {
    await ctx.client.createScene(sceneId, config, ctx.signal);
  } catch (error) {
    return errorResult(`Error creating scene: ${errorMessage(error)}`);
  }

  return textResult(`Scene '${sceneId}' created successfully`);
}

async function updateScene(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const sceneId = getString(args, 'scene_id');
  if (!sceneId) {
    return errorResult('scene_id is required');
  }

  let current: SceneConfig;
  try {
    current = await ctx.client.getSceneConfig(sceneId, ctx.signal);
  } catch (error) {
    return errorResult(`Error getting current scene: ${errorMessage(error)}`);
  }

  const config: SceneConfig = { ...current, id: current.id ?? sceneId };
  const name = getOptionalString(args, 'name');
  if (name) {
    config.name = name;
  }
  const icon = getOptionalString(args, 'icon');
  if (icon !== undefined) {
    config.icon = icon;
  }

  const rawEntities = getRecord(args, 'entities');
  if (rawEntities) {
    const parsed = parseSceneEntities(rawEntities);
    if ('invalid' in parsed) {
      return errorResult(`Invalid state format for entity ${parsed.invalid}`);
    }
    config.entities = parsed.entities;
  }

  try {
    await ctx.client.updateScene(sceneId, config, ctx.signal);
  } catch (error) {
    return errorResult(`Error updating scene: ${errorMessage(error)}`);
  }

  return textResult(`Scene '${sceneId}' updated successfully`);
}

async function deleteScene(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const sceneId = getString(args, 'scene_id');
  if (!sceneId) {
    return errorResult('scene_id is required');
  }

  try {
    await ctx.client.deleteScene(sceneId, ctx.signal);
  } catch (error) {
    return errorResult(`Error deleting scene: ${errorMessage(error)}`);
  }

  return textResult(`Scene '${sceneId}' deleted successfully`);
}

async function activateScene(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const sceneId = getString(args, 'scene_id');
  if (!sceneId) {
    return errorResult('scene_id is required');
  }

  const entityId = sceneId.startsWith('scene.') ? sceneId : `scene.${sceneId}`;
  const transition = getNumber(args, 'transition');
  try {
    await ctx.client.callService(
      'scene',
      'turn_on',
      { entity_id: entityId, ...(transition !== undefined ? { transition } : {}) },
      ctx.signal
    );
  } catch (error) {
    return errorResult(`Error activating scene: ${errorMessage(error)}`);
  }

  return textResult(`Scene '${sceneId}' activated successfully`);
}

const sceneEntities = z
  .record(
    z.string(),
    z.union([z.string(), z.object({ state: z.string().optional(), attributes: z.record(z.string(), z.unknown()).optional() })])
  )
  .describe('Entity id to state, e.g. {"light.sofa": "on", "light.desk": {"state": "on", "attributes": {"brightness": 120}}}');

export const sceneTools: ToolDefinition[] = [
  {
    name: 'list_scenes',
    description: 'List scenes with the entities each one controls.',
    inputSchema: {
      name_contains: z.string().optional().describe('Case-insensitive substring of the entity id or name'),
      entity_contains: z.string().optional().describe('Only scenes controlling an entity whose id contains this')
    },
    mutating: false,
    handler: listScenes
  },
  {
    name: 'get_scene',
    description: 'Get the stored configuration of a scene.',
    inputSchema: {
      scene_id: z.string().describe('Scene config id, which is also the object id of scene.<id>')
    },
    mutating: false,
    handler: getScene
  },
  {
    name: 'create_scene',
    description: 'Create a scene from entity states.',
    inputSchema: {
      scene_id: z.string(),
      name: z.string(),
      icon: z.string().optional(),
      entities: sceneEntities
    },
    mutating: true,
    handler: createScene
  },
  {
    name: 'update_scene',
    description: 'Update a scene. Omitted fields keep their stored values; entities, when given, replace the member list.',
    inputSchema: {
      scene_id: z.string(),
      name: z.string().optional(),
      icon: z.string().optional(),
      entities: sceneEntities.optional()
    },
    mutating: true,
    handler: updateScene
  },
  {
    name: 'delete_scene',
    description: 'Delete a scene.',
    inputSchema: {
      scene_id: z.string()
    },
    mutating: true,
    handler: deleteScene
  },
  {
    name: 'activate_scene',
    description: 'Activate a scene.',
    inputSchema: {
      scene_id: z.string(),
      transition: z.number().optional().describe('Transition time in seconds')
    },
    mutating: true,
    handler: activateScene
  }
];
