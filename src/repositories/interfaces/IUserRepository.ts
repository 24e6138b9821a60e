import { User } from '@/models';

/**
 * User Repository Interface
 */
export interface IUserRepository {
  /**
   * @returns the owner, or null if not found
   */
  findUserById(userId: number): Promise<User | null>;
}
