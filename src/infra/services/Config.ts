import type { Config, MessageTemplates } from '../../core/ports';
import type { PolicyConfig } from '../config/policySchema';

// Synchronous configuration service implementing Config port interface
// Policy is loaded at startup and doesn't change
export class ConfigImpl implements Config {
  constructor(private readonly policy: PolicyConfig) {}

  libraryName(): string {
    return this.policy.library.name;
  }

  untitledLabel(): string {
    return this.policy.library.untitledLabel;
  }

  // Copy so callers cannot mutate the loaded policy
  messages(): MessageTemplates {
    return { ...this.policy.templates };
  }
}
