import { type Generated } from "kysely";

export interface Order {
	id: Generated<number>;
	customer_id: number;
	amount: number;
}

export interface Customer {
	id: Generated<number>;
	name: string;
	region: string;
}

export interface Sale {
	id: Generated<number>;
	region: string;
	amount: number;
}

export interface RegionTotal {
	region: string;
	amount: number;
}

// Kysely Database interface
export interface LineageDB {
	orders: Order;
	customers: Customer;
	raw_sales: Sale;
	sales_summary: Sale;
	report: Order;
	region_totals: RegionTotal;
}
