/**
 * Registry Errors
 *
 * All three are caller-input errors. The registry is never mutated when one is thrown.
 */

export type RegistryErrorKind = 'NotFound' | 'AlreadyRegistered' | 'NotRegistered'

export abstract class RegistryError extends Error {
  abstract readonly kind: RegistryErrorKind

  constructor(
    message: string,
    public readonly activityName: string,
    public readonly email?: string
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class ActivityNotFoundError extends RegistryError {
  readonly kind = 'NotFound'

  constructor(activityName: string) {
    super('Activity not found', activityName)
  }
}

export class AlreadyRegisteredError extends RegistryError {
  readonly kind = 'AlreadyRegistered'

  constructor(activityName: string, email: string) {
    super('Student is already signed up for this activity', activityName, email)
  }
}

export class NotRegisteredError extends RegistryError {
  readonly kind = 'NotRegistered'

  constructor(activityName: string, email: string) {
    super('Student is not signed up for this activity', activityName, email)
  }
}
