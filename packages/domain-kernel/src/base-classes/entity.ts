export abstract class Entity<TProps> {
  protected readonly props: TProps;

  constructor(
    readonly id: string,
    props: TProps,
  ) {
    this.props = props;
  }

  public equals(object?: Entity<TProps>): boolean {
    if (object === null || object === undefined) {
      return false;
    }

    if (this === object) {
      return true;
    }

    if (!isEntity(object)) {
      return false;
    }

    return this.id === object.id;
  }
}

const isEntity = (v: unknown): v is Entity<unknown> => {
  return v instanceof Entity;
};
