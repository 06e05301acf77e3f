export interface User {
  id: number
  name: string
  email: string
  createdAt: Date
}

export type NewUser = Omit<User, 'id' | 'createdAt'>
