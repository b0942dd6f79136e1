export interface User {
  userId: string;
  name: string;
  email: string;
  createdAt: string;
  updatedAt: string;
}
