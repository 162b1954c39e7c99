export interface SecurityState {
  readonly sipDisabled: boolean;
  readonly checkedAt: Date | undefined;
}

export const initialSecurityState: SecurityState = {
  sipDisabled: false,
  checkedAt: undefined,
};

/** `csrutil status` reports "disabled" somewhere in its output when the gate is open. */
export const parseCsrutilStatus = (output: string): boolean =>
  output.toLowerCase().includes("disabled");
