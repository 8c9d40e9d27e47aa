import { inspect } from 'util';
import { ValidationError } from '../../common/errors/app-error';
import { credentialSchema, type CredentialInput } from './signature.validation';

/**
 * Caller identity used to sign every request. Validated once here; all fields
 * are read-only afterwards so one instance can be shared between concurrent calls.
 */
export class Credential {
  public readonly appId: number;
  public readonly secretId: string;
  public readonly expired: number;
  public readonly userId: string;
  public readonly secretKey: string;

  constructor(input: CredentialInput) {
    const result = credentialSchema.safeParse(input);
    if (!result.success) {
      throw new ValidationError('Invalid credential', result.error.format());
    }

    this.appId = result.data.appId;
    this.secretId = result.data.secretId;
    this.secretKey = result.data.secretKey;
    this.expired = result.data.expired;
    this.userId = result.data.userId;
    Object.freeze(this);
  }

  // secretKey is never serialized or inspected
  toJSON(): Omit<CredentialInput, 'secretKey'> {
    return {
      appId: this.appId,
      secretId: this.secretId,
      expired: this.expired,
      userId: this.userId,
    };
  }

  [inspect.custom](): string {
    return `Credential ${inspect(this.toJSON())}`;
  }
}
