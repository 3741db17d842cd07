/**
 * Users and projects, served by the directory service.
 *
 * @module client/directory-client
 */
import { ProjectSchema, UserSchema, type Project, type User } from '@fieldlink/shared/device-schemas';
import { ApiClient, type ApiClientOptions } from './api-client.js';

export class DirectoryClient {
  readonly api: ApiClient;

  constructor(options: ApiClientOptions | ApiClient) {
    this.api = options instanceof ApiClient ? options : new ApiClient(options);
  }

  getProjectBySubdomain(subdomain: string): Promise<Project> {
    return this.api.call('project/v2/get_project_by_subdomain', { subdomain }, { schema: ProjectSchema });
  }

  getUserByEmail(email: string): Promise<User> {
    return this.api.call('user/v2/get_user_by_email', { email }, { schema: UserSchema });
  }

  getUserById(userId: number): Promise<User> {
    return this.api.call('user/v2/get_user_by_id', { user_id: userId }, { schema: UserSchema });
  }
}
