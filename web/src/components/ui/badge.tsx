import { clsx } from "clsx";
import type * as React from "react";

type BadgeProps = Omit<React.ButtonHTMLAttributes<HTMLButtonElement>, "onChange"> & {
	/** Renders the badge as a toggle chip. */
	pressed: boolean;
	onPressedChange: (pressed: boolean) => void;
};

const Badge: React.FC<BadgeProps> = ({
	className,
	pressed,
	onPressedChange,
	...props
}) => (
	<button
		type="button"
		aria-pressed={pressed}
		onClick={() => onPressedChange(!pressed)}
		className={clsx(
			"inline-flex items-center rounded-full px-3 py-1 text-xs font-semibold transition-colors focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-ring",
			pressed
				? "bg-primary text-primary-foreground hover:bg-primary/80"
				: "border border-input text-muted-foreground hover:bg-accent hover:text-accent-foreground",
			className,
		)}
		{...props}
	/>
);

export { Badge };
