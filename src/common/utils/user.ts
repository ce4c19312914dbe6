export interface UserSpec {
  uid: string;
  gid: string;
}

export const parseUser = (user: string): UserSpec => {
  const parts = user.split(':');
  if (parts.length === 2) {
    return { uid: parts[0], gid: parts[1] };
  }
  return { uid: user, gid: '' };
};
