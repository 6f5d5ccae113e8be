import prompts from 'prompts';
import chalk from 'chalk';
import type { CliContext } from './state.js';
import { describeError, formatGroupLine, formatRequest, printGroup, printProfile } from './format.js';

export async function startInteractive(ctx: CliContext) {
    const { client } = ctx;
    console.log(chalk.cyan(`Signed in as ${client.actorId}`));

    let groups = await client.myGroups();
    if (groups.length === 0) {
        console.log(chalk.yellow("You are not in any care circle yet. Create one or join with an invite code."));
    }
    let activeGroupId: string | null = groups[0]?.id ?? null;

    while (true) {
        const activeGroup = groups.find(g => g.id === activeGroupId);
        const groupName = activeGroup ? activeGroup.name : 'None';

        const { action } = await prompts({
            type: 'select',
            name: 'action',
            message: `CareCircle - Select an action (Current Circle: ${chalk.green(groupName)})`,
            choices: [
                { title: 'View Circle', value: 'view' },
                { title: 'Switch Circle', value: 'switch_group' },
                { title: 'Create Circle', value: 'create' },
                { title: 'Join with Invite Code', value: 'join' },
                { title: 'Review Join Requests', value: 'requests' },
                { title: 'Leave Circle', value: 'leave' },
                { title: 'My Profile', value: 'profile' },
                { title: 'Exit', value: 'exit' }
            ]
        });

        if (typeof action !== 'string' || action === 'exit') break;

        try {
            if (action === 'view') {
                if (!activeGroupId) {
                    console.log(chalk.red("No active circle selected."));
                    continue;
                }
                const [group, members, trial] = await Promise.all([
                    client.getGroup(activeGroupId),
                    client.members(activeGroupId),
                    client.trialStatus(activeGroupId),
                ]);
                printGroup(group, members, trial);
            } else if (action === 'switch_group') {
                const { newGroupId } = await prompts({
                    type: 'select',
                    name: 'newGroupId',
                    message: 'Select a circle',
                    choices: groups.map(g => ({ title: formatGroupLine(g), value: g.id }))
                });
                if (typeof newGroupId === 'string') activeGroupId = newGroupId;
            } else if (action === 'create') {
                const response = await prompts([
                    { type: 'text', name: 'name', message: 'Circle name' },
                    { type: 'text', name: 'displayName', message: 'Your display name', initial: 'Admin' },
                    { type: 'confirm', name: 'requireApproval', message: 'Require approval for new members?', initial: false }
                ]);
                if (typeof response.name === 'string') {
                    const group = await client.createGroup(response.name, {
                        displayName: typeof response.displayName === 'string' ? response.displayName : undefined,
                        requireApproval: response.requireApproval === true,
                    });
                    await ctx.save();
                    activeGroupId = group.id;
                    console.log(chalk.green(`Circle created. Share the invite code ${chalk.bold(group.inviteCode)}.`));
                }
            } else if (action === 'join') {
                const response = await prompts([
                    { type: 'text', name: 'code', message: 'Invite code' },
                    { type: 'text', name: 'displayName', message: 'Your display name' }
                ]);
                if (typeof response.code === 'string' && typeof response.displayName === 'string') {
                    const preview = await client.previewInvite(response.code);
                    const { confirmed } = await prompts({
                        type: 'confirm',
                        name: 'confirmed',
                        message: `Join ${preview.name} (${preview.memberCount} member(s))?`,
                        initial: true
                    });
                    if (confirmed !== true) continue;

                    const outcome = await client.requestJoin(response.code, response.displayName);
                    await ctx.save();
                    if (outcome.status === 'joined') {
                        activeGroupId = outcome.group.id;
                        console.log(chalk.green(`Joined ${outcome.group.name}.`));
                    } else {
                        console.log(chalk.yellow("Request sent. An admin needs to approve it."));
                    }
                }
            } else if (action === 'requests') {
                if (!activeGroupId) continue;
                const pending = await client.pendingRequests(activeGroupId);
                if (pending.length === 0) {
                    console.log(chalk.gray("No pending requests."));
                    continue;
                }
                for (const request of pending) {
                    const { decision } = await prompts({
                        type: 'select',
                        name: 'decision',
                        message: formatRequest(request),
                        choices: [
                            { title: 'Approve', value: 'approve' },
                            { title: 'Deny', value: 'deny' },
                            { title: 'Skip', value: 'skip' }
                        ]
                    });
                    if (decision === 'approve') {
                        await client.approve(activeGroupId, request.id);
                        console.log(chalk.green(`${request.userName} joined the circle.`));
                    } else if (decision === 'deny') {
                        await client.deny(activeGroupId, request.id);
                        console.log(chalk.yellow(`Denied ${request.userName}.`));
                    }
                    await ctx.save();
                }
            } else if (action === 'leave') {
                if (!activeGroupId) continue;
                const { confirmed } = await prompts({
                    type: 'confirm',
                    name: 'confirmed',
                    message: 'Leaving starts a 30 day cooldown before you can start your own circle. Continue?',
                    initial: false
                });
                if (confirmed !== true) continue;

                await client.leave(activeGroupId);
                await ctx.save();
                activeGroupId = null;
                console.log(chalk.green("You left the circle."));
            } else if (action === 'profile') {
                printProfile(await client.profile());
            }
        } catch (e) {
            console.log(chalk.red(`Error: ${describeError(e)}`));
        }

        groups = await client.myGroups();
        if (activeGroupId === null) activeGroupId = groups[0]?.id ?? null;
    }
}
