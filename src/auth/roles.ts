export enum Role { BORROWER = 'BORROWER', OWNER = 'OWNER' }

/** An already-authenticated caller. */
export type Caller = { id: string; role: Role };

export type RoleResolver = (callerId: string) => Role;

export function ownerResolver(ownerId: string): RoleResolver {
  return (callerId) => (callerId === ownerId ? Role.OWNER : Role.BORROWER);
}

export function isOwner(caller: Caller): boolean {
  return caller.role === Role.OWNER;
}
