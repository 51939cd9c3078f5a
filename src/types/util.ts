import {Flavor} from "../helpers/types";

export type Milliseconds = Flavor<number, 'Milliseconds'>;
