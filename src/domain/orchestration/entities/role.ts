export type RoleName = "study" | "code" | "verify";

export interface RoleDefinition {
  name: RoleName;
  responsibility: string;
  requiredInputs: string[];
  outputs: string[];
}

const ROLE_CATALOG: ReadonlyArray<RoleDefinition> = [
  {
    name: "study",
    responsibility:
      "Investigates the goal and the codebase and summarizes what must change.",
    requiredInputs: ["task"],
    outputs: ["summary"],
  },
  {
    name: "code",
    responsibility:
      "Implements the change described by the study summary and any reviewer feedback.",
    requiredInputs: ["task", "studySummary"],
    outputs: ["diffOrFiles"],
  },
  {
    name: "verify",
    responsibility:
      "Checks the latest code attempt against the goal and approves or rejects it.",
    requiredInputs: ["task", "studySummary"],
    outputs: ["approved", "feedback"],
  },
];

export const ROLE_NAMES: ReadonlyArray<RoleName> = ROLE_CATALOG.map(
  (role) => role.name,
);

export function listRoleDefinitions(): RoleDefinition[] {
  return ROLE_CATALOG.map((role) => ({
    ...role,
    requiredInputs: [...role.requiredInputs],
    outputs: [...role.outputs],
  }));
}

export function getRoleDefinition(roleName: RoleName): RoleDefinition {
  const role = ROLE_CATALOG.find((item) => item.name === roleName);
  if (!role) {
    throw new Error(`Unknown role: ${roleName}`);
  }
  return {
    ...role,
    requiredInputs: [...role.requiredInputs],
    outputs: [...role.outputs],
  };
}

export function isRoleName(value: unknown): value is RoleName {
  return ROLE_CATALOG.some((role) => role.name === value);
}
