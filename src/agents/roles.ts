import type { z } from "zod";
import {
  ArtifactHandleSchema,
  ContentBlockSchema,
  FindingsSchema,
  ImageRefSchema,
  OutlineSchema,
  type OutlineSectionSchema,
} from "../schemas.js";

export type Findings = z.infer<typeof FindingsSchema>;
export type Outline = z.infer<typeof OutlineSchema>;
export type OutlineSection = z.infer<typeof OutlineSectionSchema>;
export type ContentBlock = z.infer<typeof ContentBlockSchema>;
export type ImageRef = z.infer<typeof ImageRefSchema>;
export type ArtifactHandle = z.infer<typeof ArtifactHandleSchema>;

/** Request/response contract of every collaborator role. */
export type RoleContracts = {
  research: {
    request: { topic: string; templateKind: string };
    response: Findings;
  };
  structure: {
    request: { topic: string; templateKind: string; maxSections: number; findings: Findings };
    response: Outline;
  };
  write: {
    request: { topic: string; templateKind: string; section: OutlineSection; findings: Findings };
    response: ContentBlock;
  };
  image: {
    request: { sectionId: string; prompt: string; style: string };
    response: ImageRef;
  };
  assemble: {
    request: { topic: string; templateKind: string; outline: Outline; contentBlocks: ContentBlock[]; imageRefs: ImageRef[] };
    response: ArtifactHandle;
  };
};

export type AgentRole = keyof RoleContracts;
export type RoleRequest<R extends AgentRole> = RoleContracts[R]["request"];
export type RoleResponse<R extends AgentRole> = RoleContracts[R]["response"];

export const AGENT_ROLES: readonly AgentRole[] = ["research", "structure", "write", "image", "assemble"];

/** Response schema each role's payload is validated against. */
export const ROLE_RESPONSE_SCHEMAS: { [R in AgentRole]: z.ZodType<RoleResponse<R>> } = {
  research: FindingsSchema,
  structure: OutlineSchema,
  write: ContentBlockSchema,
  image: ImageRefSchema,
  assemble: ArtifactHandleSchema,
};

export function isAgentRole(value: string): value is AgentRole {
  return AGENT_ROLES.some((role) => role === value);
}
