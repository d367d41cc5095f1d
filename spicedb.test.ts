import { beforeEach, describe, test, expect, vi } from "vitest";
import { RelationshipConflictError, StoreRejectedError, StoreUnavailableError } from "./errors.js";
import {
  SpiceDbClient,
  fromApiRelationship,
  toApiFilter,
  toApiRelationship,
  toStoreError,
} from "./spicedb.js";
import { formatRelationship, parseRelationship } from "./tuples.js";

// ============================================================================
// Mock @authzed/authzed-node
// ============================================================================

const { mockPromises, mockClose } = vi.hoisted(() => ({
  mockPromises: {
    writeSchema: vi.fn().mockResolvedValue({}),
    readSchema: vi.fn().mockResolvedValue({ schemaText: "definition user {}" }),
    writeRelationships: vi.fn().mockResolvedValue({ writtenAt: { token: "write-token-1" } }),
    readRelationships: vi.fn().mockResolvedValue([]),
    checkPermission: vi.fn().mockResolvedValue({ permissionship: 2 }),
  },
  mockClose: vi.fn(),
}));

vi.mock("@authzed/authzed-node", () => ({
  v1: {
    NewClient: vi.fn(() => ({ promises: mockPromises, close: mockClose })),
    ClientSecurity: { INSECURE_LOCALHOST_ALLOWED: 1 },
    WriteSchemaRequest: { create: vi.fn((v: unknown) => v) },
    ReadSchemaRequest: { create: vi.fn((v: unknown) => v) },
    WriteRelationshipsRequest: { create: vi.fn((v: unknown) => v) },
    ReadRelationshipsRequest: { create: vi.fn((v: unknown) => v) },
    RelationshipFilter: { create: vi.fn((v: unknown) => v) },
    SubjectFilter: { create: vi.fn((v: unknown) => v) },
    SubjectFilter_RelationFilter: { create: vi.fn((v: unknown) => v) },
    RelationshipUpdate: { create: vi.fn((v: unknown) => v) },
    RelationshipUpdate_Operation: { CREATE: 1, TOUCH: 2, DELETE: 3 },
    Relationship: { create: vi.fn((v: unknown) => v) },
    ObjectReference: { create: vi.fn((v: unknown) => v) },
    SubjectReference: { create: vi.fn((v: unknown) => v) },
    CheckPermissionRequest: { create: vi.fn((v: unknown) => v) },
    CheckPermissionResponse_Permissionship: { HAS_PERMISSION: 2 },
    Consistency: { create: vi.fn((v: unknown) => v) },
    ZedToken: { create: vi.fn((v: unknown) => v) },
  },
}));

function grpcError(code: number, message: string): Error {
  return Object.assign(new Error(message), { code });
}

const subjectTuple = parseRelationship("role_binding:b1#subject@group:g1#member");

const apiSubjectTuple = {
  resource: { objectType: "role_binding", objectId: "b1" },
  relation: "subject",
  subject: {
    object: { objectType: "group", objectId: "g1" },
    optionalRelation: "member",
  },
};

// ============================================================================
// Conversion
// ============================================================================

describe("toApiRelationship / fromApiRelationship", () => {
  test("maps a subject set", () => {
    expect(toApiRelationship(subjectTuple)).toEqual(apiSubjectTuple);
  });

  test("an empty optional relation means a plain subject", () => {
    const rel = fromApiRelationship({
      resource: { objectType: "group", objectId: "g1" },
      relation: "member",
      subject: { object: { objectType: "user", objectId: "alice" }, optionalRelation: "" },
    });
    expect(rel && formatRelationship(rel)).toBe("group:g1#member@user:alice");
    expect(rel?.subject.relation).toBeUndefined();
  });

  test("incomplete responses are skipped", () => {
    expect(fromApiRelationship(undefined)).toBeNull();
  });
});

describe("toApiFilter", () => {
  test("prefix filter", () => {
    expect(toApiFilter({ resourceType: "role", resourceIdPrefix: "r1" })).toEqual({
      resourceType: "role",
      optionalResourceIdPrefix: "r1",
    });
  });

  test("resource and subject filter", () => {
    expect(
      toApiFilter({
        resourceType: "workspace",
        resourceId: "ws1",
        relation: "user_grant",
        subjectType: "role_binding",
        subjectRelation: "",
      }),
    ).toEqual({
      resourceType: "workspace",
      optionalResourceId: "ws1",
      optionalRelation: "user_grant",
      optionalSubjectFilter: {
        subjectType: "role_binding",
        optionalRelation: { relation: "" },
      },
    });
  });
});

// ============================================================================
// Error mapping
// ============================================================================

describe("toStoreError", () => {
  test("transient codes and plain errors are unavailability", () => {
    const err = toStoreError(grpcError(14, "connection refused"));
    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err.message).toBe("SpiceDB unavailable: connection refused");
    expect(toStoreError(new Error("socket hang up"))).toBeInstanceOf(StoreUnavailableError);
  });

  test("ALREADY_EXISTS is a conflict on the batch", () => {
    const err = toStoreError(grpcError(6, "exists"), [subjectTuple]);
    expect(err).toBeInstanceOf(RelationshipConflictError);
    expect(err instanceof RelationshipConflictError && err.existing).toEqual([subjectTuple]);
  });

  test("other codes are rejections", () => {
    const err = toStoreError(grpcError(3, "object definition `grup` not found"));
    expect(err).toBeInstanceOf(StoreRejectedError);
    expect(err.message).toBe("SpiceDB rejected request: object definition `grup` not found");
  });
});

// ============================================================================
// Client
// ============================================================================

describe("SpiceDbClient", () => {
  const config = { endpoint: "localhost:50051", token: "test-secret", insecure: true };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  test("touch writes send TOUCH updates and return the revision token", async () => {
    const client = new SpiceDbClient(config);

    const token = await client.writeRelationships(true, [subjectTuple]);

    expect(token).toBe("write-token-1");
    expect(mockPromises.writeRelationships).toHaveBeenCalledWith({
      updates: [{ operation: 2, relationship: apiSubjectTuple }],
    });
  });

  test("creates and deletes use their own operations", async () => {
    const client = new SpiceDbClient(config);

    await client.writeRelationships(false, [subjectTuple]);
    await client.deleteRelationships([subjectTuple]);

    expect(mockPromises.writeRelationships.mock.calls.map(([req]) => req.updates[0].operation)).toEqual([1, 3]);
  });

  test("empty batches skip the call", async () => {
    const client = new SpiceDbClient(config);
    expect(await client.deleteRelationships([])).toBeUndefined();
    expect(mockPromises.writeRelationships).not.toHaveBeenCalled();
  });

  test("write failures are mapped", async () => {
    mockPromises.writeRelationships.mockRejectedValueOnce(grpcError(14, "connection refused"));
    const client = new SpiceDbClient(config);

    await expect(client.writeRelationships(true, [subjectTuple])).rejects.toBeInstanceOf(
      StoreUnavailableError,
    );
  });

  test("reads are fully consistent by default", async () => {
    mockPromises.readRelationships.mockResolvedValueOnce([
      { relationship: apiSubjectTuple },
      { relationship: undefined },
    ]);
    const client = new SpiceDbClient(config);

    const rels = await client.readRelationships({ resourceType: "role_binding", resourceIdPrefix: "b1" });

    expect(rels.map(formatRelationship)).toEqual(["role_binding:b1#subject@group:g1#member"]);
    expect(mockPromises.readRelationships).toHaveBeenCalledWith({
      relationshipFilter: { resourceType: "role_binding", optionalResourceIdPrefix: "b1" },
      consistency: { requirement: { oneofKind: "fullyConsistent", fullyConsistent: true } },
    });
  });

  test("a missing schema reads as null", async () => {
    mockPromises.readSchema.mockRejectedValueOnce(grpcError(5, "No schema has been defined"));
    const client = new SpiceDbClient(config);

    expect(await client.readSchema()).toBeNull();
    expect(await client.readSchema()).toBe("definition user {}");
  });

  test("checkPermission reports HAS_PERMISSION", async () => {
    const client = new SpiceDbClient(config);

    const allowed = await client.checkPermission({
      resourceType: "inventory/groups",
      resourceId: "grp-1",
      permission: "inventory_hosts_read",
      subjectType: "user",
      subjectId: "alice",
      consistency: { mode: "full" },
    });

    expect(allowed).toBe(true);
  });

  test("close releases the connection", () => {
    new SpiceDbClient(config).close();
    expect(mockClose).toHaveBeenCalledTimes(1);
  });
});
