import { createApi } from '../api.js';
import type { Api, Doer } from '../entity/http-client.interfaces.js';
import { createMockSchema } from '../testing/schema.js';

export const ErrUserNotFound = new Error('user not found');
export const ErrUnauthorized = new Error('unauthorized');

export type User = { id: number; name: string };

type CreateUserResponse = { user_id: number };

const createUserResponse = createMockSchema(
  (v): v is CreateUserResponse =>
    typeof v === 'object' && v !== null && 'user_id' in v && typeof v.user_id === 'number',
  'user_id must be a number',
);

const getUserResponse = createMockSchema(
  (v): v is User =>
    typeof v === 'object' &&
    v !== null &&
    'id' in v &&
    typeof v.id === 'number' &&
    'name' in v &&
    typeof v.name === 'string',
  'id and name are required',
);

/**
 * Domain client of a user management API, built on top of `createApi`.
 *
 * Defaults: 200 succeeds, 401 resolves to `ErrUnauthorized` and 404 to
 * `ErrUserNotFound`. Every other status is an unhandled status error.
 */
export function createUsersClient(serverUrl: URL, doer?: Doer) {
  const api: Api = createApi({
    baseUrl: serverUrl,
    doer,
    handlers: {
      200: () => undefined,
      401: () => ErrUnauthorized,
      404: () => ErrUserNotFound,
    },
  });

  return {
    async createUser(userName: string): Promise<number> {
      let userID = 0;
      await api
        .do(api.post('/users').sendJSON({ user_name: userName }))
        .receiveJSON(200, createUserResponse, (response) => {
          userID = response.user_id;
        })
        .resolveOrThrow();
      return userID;
    },

    async getUserByID(userID: number): Promise<User> {
      let user: User = { id: 0, name: '' };
      await api
        .do(api.get('/users/{userID}').pathReplacer('{userID}', String(userID)))
        .receiveJSON(200, getUserResponse, (response) => {
          user = { id: response.id, name: response.name };
        })
        .resolveOrThrow();
      return user;
    },

    async deleteUserByID(userID: number): Promise<void> {
      const error = await api.execute(
        api.delete('/users/{userID}').pathReplacer('{userID}', String(userID)),
      );
      if (error) throw error;
    },
  };
}
