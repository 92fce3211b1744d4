let _id = 0;
export function id(): string {
  return String(_id++);
}
