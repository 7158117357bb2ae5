import { GetParameterCommand, ParameterNotFound, SSMClient } from '@aws-sdk/client-ssm';
import { ConfigurationMissing } from '../errors.js';
import type { ParamStore } from '../types.js';

export class SsmParamStore implements ParamStore {
  constructor(private readonly client: SSMClient = new SSMClient({})) {}

  async get(key: string): Promise<string> {
    try {
      const response = await this.client.send(new GetParameterCommand({ Name: key }));
      const value = response.Parameter?.Value;
      if (value === undefined || value === '') {
        throw new ConfigurationMissing(key, `Parameter ${key} has no value`);
      }
      return value;
    } catch (error) {
      if (error instanceof ParameterNotFound) {
        throw new ConfigurationMissing(key, `Parameter ${key} was not found`, { cause: error });
      }
      throw error;
    }
  }
}
