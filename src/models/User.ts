/**
 * User model
 * Portfolio owner, matches the 'users' table
 */
export interface User {
  id: number;
  email: string;
}
