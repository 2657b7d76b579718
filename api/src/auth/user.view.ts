export interface UserView {
  id: number;
  name: string;
}

export function toUserView(user: { id: number; name: string }): UserView {
  return { id: user.id, name: user.name };
}
