import { ValidationError } from "../lib/errors";
import type {
  ComponentDefinition,
  ProjectDefinition,
  ResourceDefinition,
  TaskDefinition,
  TeamDefinition,
  WorkflowDefinition,
} from "../schemas/project.schema";

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function indexById<T extends { id: string }>(kind: string, items: T[]): Map<string, T> {
  const map = new Map<string, T>();
  for (const item of items) {
    if (map.has(item.id)) {
      throw new ValidationError(`Duplicate ${kind} id: '${item.id}'`, { kind, id: item.id });
    }
    map.set(item.id, item);
  }
  return map;
}

/**
 * Canonical collections of a project's entities. Everything outside the
 * registry refers to entities by id.
 */
export class EntityRegistry {
  private readonly workflows: Map<string, WorkflowDefinition>;
  private readonly tasks: Map<string, TaskDefinition>;
  private readonly resources: Map<string, ResourceDefinition>;
  private readonly teams: Map<string, TeamDefinition>;
  private readonly components: Map<string, ComponentDefinition>;

  private readonly workflowOfTask = new Map<string, string>();
  private readonly requiredComponents = new Map<string, string[]>();
  private readonly producedComponents = new Map<string, string[]>();
  private readonly teamMembers = new Map<string, Set<string>>();

  constructor(definition: ProjectDefinition) {
    this.workflows = indexById("workflow", definition.workflows);
    this.tasks = indexById(
      "task",
      definition.workflows.flatMap((w) => w.tasks)
    );
    this.resources = indexById("resource", definition.resources);
    this.teams = indexById("team", definition.teams);
    this.components = indexById("component", definition.components);

    for (const workflow of definition.workflows) {
      for (const task of workflow.tasks) {
        this.workflowOfTask.set(task.id, workflow.id);
        this.requiredComponents.set(task.id, []);
        this.producedComponents.set(task.id, []);
      }
    }

    for (const workflow of definition.workflows) {
      for (const task of workflow.tasks) {
        for (const predId of task.predecessors) {
          const predWorkflow = this.workflowOfTask.get(predId);
          if (predWorkflow === undefined) {
            throw new ValidationError(
              `Task '${task.id}' depends on unknown task '${predId}'`,
              { taskId: task.id, predecessorId: predId }
            );
          }
          if (predWorkflow !== workflow.id) {
            throw new ValidationError(
              `Task '${task.id}' in workflow '${workflow.id}' depends on ` +
                `'${predId}' from workflow '${predWorkflow}'`,
              { taskId: task.id, predecessorId: predId }
            );
          }
        }
        for (const componentId of task.components) {
          if (!this.components.has(componentId)) {
            throw new ValidationError(
              `Task '${task.id}' requires unknown component '${componentId}'`,
              { taskId: task.id, componentId }
            );
          }
          const required = this.requiredComponents.get(task.id);
          if (required && !required.includes(componentId)) required.push(componentId);
        }
        for (const req of task.requirements) {
          if (req.team !== undefined && !this.teams.has(req.team)) {
            throw new ValidationError(
              `Task '${task.id}' requires unknown team '${req.team}'`,
              { taskId: task.id, teamId: req.team }
            );
          }
        }
      }
    }

    for (const team of definition.teams) {
      for (const memberId of team.members) {
        if (!this.resources.has(memberId)) {
          throw new ValidationError(
            `Team '${team.id}' lists unknown resource '${memberId}'`,
            { teamId: team.id, resourceId: memberId }
          );
        }
      }
      this.teamMembers.set(team.id, new Set(team.members));
    }

    for (const component of definition.components) {
      for (const taskId of [...component.producedBy, ...component.requiredBy]) {
        if (!this.tasks.has(taskId)) {
          throw new ValidationError(
            `Component '${component.id}' references unknown task '${taskId}'`,
            { componentId: component.id, taskId }
          );
        }
      }
      for (const taskId of component.producedBy) {
        this.producedComponents.get(taskId)?.push(component.id);
      }
      for (const taskId of component.requiredBy) {
        const required = this.requiredComponents.get(taskId);
        if (required && !required.includes(component.id)) required.push(component.id);
      }
    }
  }

  task(id: string): TaskDefinition {
    const task = this.tasks.get(id);
    if (!task) throw new ValidationError(`Unknown task id: '${id}'`, { taskId: id });
    return task;
  }

  resource(id: string): ResourceDefinition {
    const resource = this.resources.get(id);
    if (!resource) {
      throw new ValidationError(`Unknown resource id: '${id}'`, { resourceId: id });
    }
    return resource;
  }

  component(id: string): ComponentDefinition {
    const component = this.components.get(id);
    if (!component) {
      throw new ValidationError(`Unknown component id: '${id}'`, { componentId: id });
    }
    return component;
  }

  workflowOf(taskId: string): string {
    const workflowId = this.workflowOfTask.get(taskId);
    if (workflowId === undefined) {
      throw new ValidationError(`Unknown task id: '${taskId}'`, { taskId });
    }
    return workflowId;
  }

  allTasks(): TaskDefinition[] {
    return [...this.tasks.values()];
  }

  // sorted by id
  allResources(): ResourceDefinition[] {
    return [...this.resources.values()].sort((a, b) => compareIds(a.id, b.id));
  }

  allTeams(): TeamDefinition[] {
    return [...this.teams.values()];
  }

  allComponents(): ComponentDefinition[] {
    return [...this.components.values()];
  }

  allWorkflows(): WorkflowDefinition[] {
    return [...this.workflows.values()];
  }

  componentsRequiredBy(taskId: string): readonly string[] {
    return this.requiredComponents.get(taskId) ?? [];
  }

  componentsProducedBy(taskId: string): readonly string[] {
    return this.producedComponents.get(taskId) ?? [];
  }

  isMember(teamId: string, resourceId: string): boolean {
    return this.teamMembers.get(teamId)?.has(resourceId) ?? false;
  }

  teamsOf(resourceId: string): string[] {
    return [...this.teamMembers.entries()]
      .filter(([, members]) => members.has(resourceId))
      .map(([teamId]) => teamId)
      .sort(compareIds);
  }
}
