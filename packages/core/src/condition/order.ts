export const Order = {
  ASC: 'ASC',
  DESC: 'DESC',
} as const;

export type Order = (typeof Order)[keyof typeof Order];

const ORDERS: readonly string[] = Object.values(Order);

export interface OrderingEntry {
  readonly field: string;
  readonly direction: Order;
}

export function orderSql(order: Order): string {
  switch (order) {
    case 'ASC': {
      return 'ASC';
    }
    case 'DESC': {
      return 'DESC';
    }
  }
}

export function isOrder(value: unknown): value is Order {
  return typeof value === 'string' && ORDERS.includes(value);
}

export function asc(field: string): OrderingEntry {
  return { field, direction: Order.ASC };
}

export function desc(field: string): OrderingEntry {
  return { field, direction: Order.DESC };
}
