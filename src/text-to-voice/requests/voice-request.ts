import { validateSync, ValidationError } from 'class-validator';
import { ConfigurationError, ReuseError } from '../text-to-voice.errors';

export interface ExecuteOptions {
  /** Aborting the signal cancels the in-flight exchange with a CancelledError. */
  signal?: AbortSignal;
}

type RequestState = 'configuring' | 'in-flight' | 'executed';

export function requireText(value: string, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigurationError(`${field} must be a non-empty string`);
  }
  return value;
}

export function flattenValidationErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((constraint) =>
      parent ? `${path}: ${constraint}` : constraint,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

/**
 * Lifecycle shared by the builders. Fields accumulate while configuring;
 * a successful execute is terminal, a failed one leaves the builder as it was.
 */
export abstract class VoiceRequest<TPayload extends object, TResult> {
  private state: RequestState = 'configuring';

  protected constructor(protected readonly fields: TPayload) {}

  get executed(): boolean {
    return this.state === 'executed';
  }

  /** Copy of the JSON body that `execute()` would send. */
  abstract payload(): TPayload;

  async execute(options: ExecuteOptions = {}): Promise<TResult> {
    if (this.state === 'executed') {
      throw new ReuseError('Request has already been executed; build a new one');
    }
    if (this.state === 'in-flight') {
      throw new ReuseError('Request is already in flight');
    }

    const issues = flattenValidationErrors(
      validateSync(this.fields, { forbidUnknownValues: false }),
    );
    if (issues.length > 0) {
      throw new ConfigurationError(`Invalid request: ${issues.join('; ')}`);
    }

    this.state = 'in-flight';
    try {
      const result = await this.send(this.payload(), options);
      this.state = 'executed';
      return result;
    } catch (err) {
      this.state = 'configuring';
      throw err;
    }
  }

  protected set<K extends keyof TPayload>(key: K, value: TPayload[K]): this {
    this.assertConfigurable(String(key));
    this.fields[key] = value;
    return this;
  }

  protected assertConfigurable(field: string): void {
    if (this.state !== 'configuring') {
      throw new ReuseError(`Cannot change ${field} once the request has been sent`);
    }
  }

  protected abstract send(payload: TPayload, options: ExecuteOptions): Promise<TResult>;
}
